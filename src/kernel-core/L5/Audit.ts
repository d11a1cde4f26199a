// src/kernel-core/L5/Audit.ts
import { hash, canonicalize, toHex, fromHex } from '../L0/Crypto.js';
import type { BlockNumber, ClaimEvent, ClaimEventRecord, Extrinsic } from '../L0/Ontology.js';
import { ErrorCode, KernelError } from '../Errors.js';

/**
 * Persistence Port: Event Store
 * Handles the append-only log of dispatched extrinsics.
 */
export interface IEventStore {
    append(evidence: Evidence): Promise<void>;
    getHistory(): Promise<Evidence[]>;
    getLatest(): Promise<Evidence | null>;
}

export type EvidenceStatus = 'SUCCESS' | 'REJECT' | 'ABORTED';

// --- Evidence (one entry per dispatched extrinsic) ---
export interface Evidence {
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    blockNumber: BlockNumber;
    extrinsic: Extrinsic;
    status: EvidenceStatus;
    code?: string;
    reason?: string;
    events: ClaimEventRecord[];
}

export interface EvidenceInput {
    blockNumber: BlockNumber;
    extrinsic: Extrinsic;
    status: EvidenceStatus;
    code?: string;
    reason?: string;
    events?: ClaimEvent[];
}

export const GENESIS_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

export function encodeEvent(event: ClaimEvent): ClaimEventRecord {
    const proof = toHex(event.proof);
    switch (event.kind) {
        case 'ClaimCreated': return { kind: event.kind, who: event.who, proof };
        case 'ClaimTransfered': return { kind: event.kind, from: event.from, to: event.to, proof };
        case 'ClaimRevoked': return { kind: event.kind, who: event.who, proof };
    }
}

export function decodeEvent(record: ClaimEventRecord): ClaimEvent {
    const proof = fromHex(record.proof);
    if (!proof) throw new KernelError(ErrorCode.REPLAY_FAILURE, `Undecodable proof in ${record.kind} event`);
    switch (record.kind) {
        case 'ClaimCreated': return { kind: record.kind, who: record.who, proof };
        case 'ClaimTransfered': return { kind: record.kind, from: record.from, to: record.to, proof };
        case 'ClaimRevoked': return { kind: record.kind, who: record.who, proof };
    }
}

export class AuditLog {
    private localChain: Evidence[] = [];

    constructor(private store?: IEventStore) { }

    public async append(input: EvidenceInput): Promise<Evidence> {
        const latest = this.localChain.length > 0
            ? this.localChain[this.localChain.length - 1]
            : await this.store?.getLatest();

        const previousHash = latest ? latest.evidenceId : GENESIS_HASH;
        const events = (input.events ?? []).map(encodeEvent);

        const body: Omit<Evidence, 'evidenceId'> = {
            previousEvidenceId: previousHash,
            blockNumber: input.blockNumber,
            extrinsic: input.extrinsic,
            status: input.status,
            events,
            ...(input.code ? { code: input.code } : {}),
            ...(input.reason ? { reason: input.reason } : {})
        };

        const evidence: Evidence = { evidenceId: AuditLog.calculateHash(body), ...body };

        // Immutability Law
        Object.freeze(evidence);

        if (this.store) {
            await this.store.append(evidence);
        }

        this.localChain.push(evidence);
        return evidence;
    }

    public async getHistory(): Promise<Evidence[]> {
        if (this.store) {
            return await this.store.getHistory();
        }
        return [...this.localChain];
    }

    public async getRecent(limit: number): Promise<Evidence[]> {
        const history = await this.getHistory();
        return limit > 0 ? history.slice(-limit) : [];
    }

    // Historical Legitimacy: linkage and hash of every entry
    public async verifyChain(): Promise<boolean> {
        const history = await this.getHistory();
        let prev = GENESIS_HASH;

        for (const entry of history) {
            if (entry.previousEvidenceId !== prev) return false;

            const { evidenceId, ...body } = entry;
            if (AuditLog.calculateHash(body) !== evidenceId) return false;

            prev = evidenceId;
        }
        return true;
    }

    public async getTip(): Promise<Evidence | null> {
        if (this.localChain.length > 0) return this.localChain[this.localChain.length - 1] ?? null;
        if (this.store) return (await this.store.getLatest()) ?? null;
        return null;
    }

    private static calculateHash(body: Omit<Evidence, 'evidenceId'>): string {
        // Canonical Evidence Tuple
        // [PreviousHash, BlockNumber, ExtrinsicHash, Status, Code, ReasonHash, EventsHash]
        const canonical: [string, number, string, string, string, string, string] = [
            body.previousEvidenceId,
            body.blockNumber,
            hash(canonicalize(body.extrinsic)),
            body.status,
            body.code ?? '',
            hash(body.reason ?? ''),
            hash(canonicalize(body.events))
        ];

        return hash(canonicalize(canonical));
    }
}
