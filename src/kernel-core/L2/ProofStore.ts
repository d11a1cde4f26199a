import { freeze, produce } from 'immer';
import type { AccountId, Proof, ProofKey, ProofRecord } from '../L0/Ontology.js';
import { toHex } from '../L0/Crypto.js';
import { ErrorCode, KernelError } from '../Errors.js';

export type RegistrySnapshot = Readonly<Record<ProofKey, Readonly<ProofRecord>>>;

/**
 * Proof Record Store port.
 * Exclusive owner of the proof -> record mapping. All operations are
 * single-key and synchronous, and none of them emit events.
 */
export interface IProofStore {
    exists(proof: Proof): boolean;
    get(proof: Proof): ProofRecord | undefined;
    insert(proof: Proof, record: ProofRecord): void;
    setOwner(proof: Proof, newOwner: AccountId): void;
    remove(proof: Proof): void;
    readonly size: number;
    snapshot(): RegistrySnapshot;
    /** Reinstates an earlier snapshot wholesale. */
    restore(snapshot: RegistrySnapshot): void;
}

export function proofKey(proof: Proof): ProofKey {
    return toHex(proof);
}

/**
 * In-memory registry. Every write produces a new frozen snapshot, so a
 * snapshot handed out earlier never observes later writes.
 */
export class ProofStore implements IProofStore {
    private records: RegistrySnapshot;

    constructor(initial: RegistrySnapshot = {}) {
        this.records = freeze({ ...initial }, true);
    }

    public exists(proof: Proof): boolean {
        return this.has(proofKey(proof));
    }

    public get(proof: Proof): ProofRecord | undefined {
        const key = proofKey(proof);
        return this.has(key) ? this.records[key] : undefined;
    }

    public insert(proof: Proof, record: ProofRecord): void {
        const key = proofKey(proof);
        if (this.has(key)) {
            throw new KernelError(ErrorCode.PROOF_ALREADY_CLAIMED, `Record already present for ${key}`);
        }
        this.records = produce(this.records, draft => {
            draft[key] = { owner: record.owner, createdAt: record.createdAt };
        });
    }

    // I2: createdAt is carried over untouched.
    public setOwner(proof: Proof, newOwner: AccountId): void {
        const key = this.requireExisting(proof);
        this.records = produce(this.records, draft => {
            const record = draft[key];
            if (record) record.owner = newOwner;
        });
    }

    public remove(proof: Proof): void {
        const key = this.requireExisting(proof);
        this.records = produce(this.records, draft => {
            delete draft[key];
        });
    }

    public get size(): number {
        return Object.keys(this.records).length;
    }

    public snapshot(): RegistrySnapshot {
        return this.records;
    }

    public restore(snapshot: RegistrySnapshot): void {
        this.records = freeze({ ...snapshot }, true);
    }

    private has(key: ProofKey): boolean {
        return Object.prototype.hasOwnProperty.call(this.records, key);
    }

    private requireExisting(proof: Proof): ProofKey {
        const key = proofKey(proof);
        if (!this.has(key)) {
            throw new KernelError(ErrorCode.NO_SUCH_PROOF, `No record present for ${key}`);
        }
        return key;
    }
}
