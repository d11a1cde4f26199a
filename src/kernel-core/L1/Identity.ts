import { canonicalize, fromHex, signData, verifySignature } from '../L0/Crypto.js';
import type { KeyPair } from '../L0/Crypto.js';
import type { AccountId, Call, Extrinsic } from '../L0/Ontology.js';
import { NonceGuard, enforce } from '../L0/Guards.js';
import { ErrorCode, KernelError } from '../Errors.js';

const ACCOUNT_ID = /^[0-9a-f]{64}$/;

export function isAccountId(value: unknown): value is AccountId {
    return typeof value === 'string' && ACCOUNT_ID.test(value);
}

/**
 * The exact bytes an account signs: canonical JSON of call, nonce and signer.
 */
export function signingPayload(signer: AccountId, nonce: number, call: Call): string {
    return canonicalize({ call, nonce, signer });
}

export function signExtrinsic(call: Call, nonce: number, keys: KeyPair): Extrinsic {
    return {
        signer: keys.publicKey,
        nonce,
        call,
        signature: signData(signingPayload(keys.publicKey, nonce, call), keys.privateKey)
    };
}

/**
 * Identity Authenticator
 * Resolves a signed extrinsic to its AccountId, or rejects it before it
 * can reach the Claim Service. Tracks per-account nonces.
 */
export class Authenticator {
    private nonces: Map<AccountId, number> = new Map();

    public nextNonce(account: AccountId): number {
        return this.nonces.get(account) ?? 0;
    }

    /**
     * @param allowFutureNonce - pool admission accepts nonces ahead of the
     * account's next one; dispatch does not.
     */
    public ensureSigned(extrinsic: Extrinsic, allowFutureNonce: boolean = false): AccountId {
        const { signer, nonce, call, signature } = extrinsic;

        if (!isAccountId(signer)) {
            throw new KernelError(ErrorCode.BAD_ORIGIN, 'Signer must be a 32-byte hex public key');
        }
        if (!Number.isSafeInteger(nonce) || nonce < 0) {
            throw new KernelError(ErrorCode.BAD_ORIGIN, 'Nonce must be a non-negative integer');
        }
        if (typeof signature !== 'string' || !fromHex(signature)) {
            throw new KernelError(ErrorCode.SIGNATURE_INVALID, 'Signature must be hex encoded');
        }
        if (!verifySignature(signingPayload(signer, nonce, call), signature, signer)) {
            throw new KernelError(ErrorCode.SIGNATURE_INVALID, 'Invalid Signature', { signer });
        }

        enforce(NonceGuard({ expected: this.nextNonce(signer), provided: nonce, allowFuture: allowFutureNonce }));
        return signer;
    }

    public consumeNonce(account: AccountId, nonce: number): void {
        enforce(NonceGuard({ expected: this.nextNonce(account), provided: nonce }));
        this.nonces.set(account, nonce + 1);
    }

    /**
     * Hands back a nonce consumed by an extrinsic whose outcome could not be
     * recorded. Only the most recent consumption can be released.
     */
    public releaseNonce(account: AccountId, nonce: number): void {
        if (this.nextNonce(account) !== nonce + 1) {
            throw new KernelError(ErrorCode.STALE_NONCE, `Nonce ${nonce} is not the last consumed by ${account}`);
        }
        if (nonce === 0) this.nonces.delete(account);
        else this.nonces.set(account, nonce);
    }

    /**
     * Replay: rehydrate nonce memory from persisted history.
     */
    public registerNonce(account: AccountId, nonce: number): void {
        const next = Math.max(this.nextNonce(account), nonce + 1);
        this.nonces.set(account, next);
    }
}
