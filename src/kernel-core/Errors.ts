/**
 * Claim Registry Error Taxonomy
 * Centralized error codes for formal rejections and terminal failures.
 */

export enum ErrorCode {
    // I. Claim Preconditions (INV-REG)
    PROOF_ALREADY_CLAIMED = 'PROOF_ALREADY_CLAIMED',
    NO_SUCH_PROOF = 'NO_SUCH_PROOF',
    NOT_PROOF_OWNER = 'NOT_PROOF_OWNER',
    PROOF_OVERSIZE = 'PROOF_OVERSIZE',

    // II. Origin & Signature (INV-ID)
    BAD_ORIGIN = 'BAD_ORIGIN',
    SIGNATURE_INVALID = 'SIGNATURE_INVALID',
    STALE_NONCE = 'STALE_NONCE',
    FUTURE_NONCE = 'FUTURE_NONCE',
    MALFORMED_CALL = 'MALFORMED_CALL',

    // III. Kernel Lifecycle & Internal
    KERNEL_NOT_ACTIVE = 'KERNEL_NOT_ACTIVE',
    ILLEGAL_TRANSITION = 'ILLEGAL_TRANSITION',
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
    REPLAY_FAILURE = 'REPLAY_FAILURE',
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly reason: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Registry:${code}] ${reason}`);
        this.name = 'KernelError';
    }
}

/**
 * Unrecoverable internal fault. Raised when the store is observed in a state
 * that no sequence of claim operations can produce.
 */
export class KernelHalt extends KernelError {
    constructor(reason: string, metadata?: Record<string, unknown>) {
        super(ErrorCode.INTEGRITY_BREACH, reason, metadata);
        this.name = 'KernelHalt';
    }
}

export function isKernelError(e: unknown): e is KernelError {
    return e instanceof KernelError;
}
