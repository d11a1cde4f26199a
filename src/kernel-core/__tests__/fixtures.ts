import type { IEventStore, Evidence } from '../L5/Audit.js';
import type { ISystemClock, IEventSink } from '../L4/ClaimService.js';
import type { IProofStore, RegistrySnapshot } from '../L2/ProofStore.js';
import type { AccountId, BlockNumber, ClaimEvent, Proof, ProofRecord } from '../L0/Ontology.js';

// --- In-process stand-ins shared by the kernel suites ---

export class MemoryEventStore implements IEventStore {
    private events: Evidence[] = [];

    async append(evidence: Evidence): Promise<void> {
        this.events.push(evidence);
    }
    async getHistory(): Promise<Evidence[]> {
        return [...this.events];
    }
    async getLatest(): Promise<Evidence | null> {
        return this.events.length > 0 ? this.events[this.events.length - 1] ?? null : null;
    }

    /** Rewrites a stored entry in place, bypassing the chain. */
    tamper(index: number, patch: Partial<Evidence>): void {
        const entry = this.events[index];
        if (!entry) throw new Error(`No entry at ${index}`);
        this.events[index] = { ...entry, ...patch };
    }
}

export class FailingEventStore extends MemoryEventStore {
    public failing = true;

    async append(evidence: Evidence): Promise<void> {
        if (this.failing) throw new Error('disk full');
        await super.append(evidence);
    }
}

export class ManualClock implements ISystemClock {
    constructor(public block: BlockNumber = 1) { }
    now(): BlockNumber { return this.block; }
    advance(by: number = 1): void { this.block += by; }
}

export class RecordingSink implements IEventSink {
    public events: ClaimEvent[] = [];
    deposit(event: ClaimEvent): void { this.events.push(event); }
}

/**
 * A store that reports every proof as present but cannot produce a usable
 * owner for it. No sequence of claim operations can reach this state.
 */
export class CorruptedStore implements IProofStore {
    constructor(private readonly record: ProofRecord | undefined) { }
    exists(_proof: Proof): boolean { return true; }
    get(_proof: Proof): ProofRecord | undefined { return this.record; }
    insert(_proof: Proof, _record: ProofRecord): void { throw new Error('CorruptedStore is read-only'); }
    setOwner(_proof: Proof, _owner: AccountId): void { throw new Error('CorruptedStore is read-only'); }
    remove(_proof: Proof): void { throw new Error('CorruptedStore is read-only'); }
    get size(): number { return 0; }
    snapshot(): RegistrySnapshot { return {}; }
    restore(_snapshot: RegistrySnapshot): void { throw new Error('CorruptedStore is read-only'); }
}

export function proofOf(text: string): Proof {
    return new TextEncoder().encode(text);
}

export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    throw new Error('Expected function to throw');
}
