import type { AccountId, BlockNumber, ClaimEvent, Proof, ProofRecord } from '../L0/Ontology.js';
import type { IProofStore } from '../L2/ProofStore.js';
import { ClaimedGuard, OwnerGuard, ProofBoundGuard, UnclaimedGuard, enforce } from '../L0/Guards.js';
import { toHex } from '../L0/Crypto.js';
import { KernelHalt } from '../Errors.js';

/**
 * Environment Port: Logical Clock
 * Supplies the block number recorded as a claim's creation time.
 */
export interface ISystemClock {
    now(): BlockNumber;
}

/**
 * Notification Port: Event Sink
 * Receives exactly one event per successful claim operation.
 */
export interface IEventSink {
    deposit(event: ClaimEvent): void;
}

export interface ClaimServiceOptions {
    maxBytesInHash: number;
}

/**
 * Claim Service: the three registry transitions.
 *
 * Each operation runs every precondition before its single store mutation
 * and deposits its event only after the mutation, so a rejected operation
 * leaves no trace in the store or the sink.
 */
export class ClaimService {
    constructor(
        private readonly store: IProofStore,
        private readonly clock: ISystemClock,
        private readonly sink: IEventSink,
        private readonly options: ClaimServiceOptions
    ) {
        if (!Number.isInteger(options.maxBytesInHash) || options.maxBytesInHash <= 0) {
            throw new RangeError(`maxBytesInHash must be a positive integer, got ${options.maxBytesInHash}`);
        }
    }

    public get maxBytesInHash(): number {
        return this.options.maxBytesInHash;
    }

    public createClaim(sender: AccountId, proof: Proof): void {
        enforce(ProofBoundGuard({ proof, maxBytesInHash: this.options.maxBytesInHash }));
        enforce(UnclaimedGuard({ proof, store: this.store }));

        const owned = new Uint8Array(proof);
        this.store.insert(owned, { owner: sender, createdAt: this.clock.now() });
        this.sink.deposit({ kind: 'ClaimCreated', who: sender, proof: owned });
    }

    public transferClaim(sender: AccountId, newOwner: AccountId, proof: Proof): void {
        this.requireOwnership(sender, proof);

        const owned = new Uint8Array(proof);
        this.store.setOwner(owned, newOwner);
        this.sink.deposit({ kind: 'ClaimTransfered', from: sender, to: newOwner, proof: owned });
    }

    public revokeClaim(sender: AccountId, proof: Proof): void {
        this.requireOwnership(sender, proof);

        const owned = new Uint8Array(proof);
        this.store.remove(owned);
        this.sink.deposit({ kind: 'ClaimRevoked', who: sender, proof: owned });
    }

    public getClaim(proof: Proof): ProofRecord | undefined {
        return this.store.get(proof);
    }

    // Order matters: NO_SUCH_PROOF is reported before NOT_PROOF_OWNER.
    private requireOwnership(sender: AccountId, proof: Proof): void {
        enforce(ProofBoundGuard({ proof, maxBytesInHash: this.options.maxBytesInHash }));
        enforce(ClaimedGuard({ proof, store: this.store }));

        const record = this.store.get(proof);
        if (!record || !record.owner) {
            throw new KernelHalt('All proofs must have an owner', { proof: toHex(proof) });
        }

        enforce(OwnerGuard({ record, sender }));
    }
}
