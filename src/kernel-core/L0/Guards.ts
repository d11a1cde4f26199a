// src/kernel-core/L0/Guards.ts
import type { AccountId, Proof, ProofRecord } from './Ontology.js';
import type { IProofStore } from '../L2/ProofStore.js';
import { toHex } from './Crypto.js';
import { ErrorCode, KernelError } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string; details?: Record<string, unknown> };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string, details?: Record<string, unknown>): GuardResult => ({ ok: false, code, violation: msg, details });

/**
 * Throws the guard's rejection as a KernelError. Checks run before any
 * mutation, so a throw here leaves the registry untouched.
 */
export function enforce(result: GuardResult): void {
    if (!result.ok) throw new KernelError(result.code, result.violation, result.details);
}

// --- Concrete Guards ---

// 1. Bounded Proof (MaxBytesInHash)
export const ProofBoundGuard: Guard<{ proof: Proof, maxBytesInHash: number }> = ({ proof, maxBytesInHash }) => {
    if (proof.length > maxBytesInHash) {
        return FAIL(ErrorCode.PROOF_OVERSIZE, `Proof is ${proof.length} bytes, limit is ${maxBytesInHash}`, {
            length: proof.length,
            limit: maxBytesInHash
        });
    }
    return OK;
};

// 2. Unclaimed (I3: no re-creation while a record exists)
export const UnclaimedGuard: Guard<{ proof: Proof, store: IProofStore }> = ({ proof, store }) => {
    if (store.exists(proof)) return FAIL(ErrorCode.PROOF_ALREADY_CLAIMED, 'Proof has already been claimed');
    return OK;
};

// 3. Claimed (transfer/revoke target must exist)
export const ClaimedGuard: Guard<{ proof: Proof, store: IProofStore }> = ({ proof, store }) => {
    if (!store.exists(proof)) return FAIL(ErrorCode.NO_SUCH_PROOF, 'Proof has not been claimed', { proof: toHex(proof) });
    return OK;
};

// 4. Ownership (I4)
export const OwnerGuard: Guard<{ record: ProofRecord, sender: AccountId }> = ({ record, sender }) => {
    if (record.owner !== sender) return FAIL(ErrorCode.NOT_PROOF_OWNER, 'Sender is not the proof owner');
    return OK;
};

// 5. Nonce (replay protection)
// Pool admission tolerates future nonces; dispatch requires an exact match.
export const NonceGuard: Guard<{ expected: number, provided: number, allowFuture?: boolean }> = ({ expected, provided, allowFuture }) => {
    if (provided < expected) {
        return FAIL(ErrorCode.STALE_NONCE, `Nonce ${provided} already used (next is ${expected})`, { expected, provided });
    }
    if (provided > expected && !allowFuture) {
        return FAIL(ErrorCode.FUTURE_NONCE, `Nonce ${provided} is ahead of ${expected}`, { expected, provided });
    }
    return OK;
};
