/**
 * Platform: Domain Error Taxonomy
 * Translates kernel rejections into transport-level exceptions.
 */
import { ErrorCode, KernelError, KernelHalt } from '../kernel-core/Errors.js';

export abstract class PlatformError extends Error {
    public abstract readonly status: number;

    constructor(message: string, public code: string, public metadata?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when a request body cannot be parsed into a call.
 */
export class RequestValidationError extends PlatformError {
    public readonly status = 400;
    constructor(message: string, issues: string[] = []) {
        super(message, 'MALFORMED_REQUEST', { issues });
    }
}

/**
 * Thrown when origin or signature checks fail.
 */
export class SecurityViolationError extends PlatformError {
    public readonly status = 401;
    constructor(message: string, code: string, signer?: string) {
        super(message, code, { signer });
    }
}

/**
 * Thrown when a claim precondition does not hold for the caller.
 */
export class OwnershipError extends PlatformError {
    public readonly status = 403;
    constructor(message: string) {
        super(message, ErrorCode.NOT_PROOF_OWNER);
    }
}

export class ClaimNotFoundError extends PlatformError {
    public readonly status = 404;
    constructor(proof: string) {
        super(`No claim for proof ${proof}`, ErrorCode.NO_SUCH_PROOF, { proof });
    }
}

/**
 * Thrown when the request conflicts with current registry or account state.
 */
export class ConflictError extends PlatformError {
    public readonly status = 409;
    constructor(message: string, code: string) {
        super(message, code);
    }
}

/**
 * Thrown when the kernel cannot serve (suspended or violated).
 */
export class ServiceUnavailableError extends PlatformError {
    public readonly status = 503;
    constructor(message: string, code: string) {
        super(message, code);
    }
}

/**
 * Thrown when Merkle roots or invariants are breached.
 */
export class DataIntegrityError extends PlatformError {
    public readonly status = 500;
    constructor(message: string, trace?: string) {
        super(message, ErrorCode.INTEGRITY_BREACH, { trace });
    }
}

export function fromKernelError(e: KernelError): PlatformError {
    if (e instanceof KernelHalt) return new DataIntegrityError(e.reason);

    switch (e.code) {
        case ErrorCode.BAD_ORIGIN:
        case ErrorCode.SIGNATURE_INVALID:
            return new SecurityViolationError(e.reason, e.code);
        case ErrorCode.MALFORMED_CALL:
        case ErrorCode.PROOF_OVERSIZE:
            return new RequestValidationError(e.reason);
        case ErrorCode.NOT_PROOF_OWNER:
            return new OwnershipError(e.reason);
        case ErrorCode.NO_SUCH_PROOF:
            return new ClaimNotFoundError(typeof e.metadata?.proof === 'string' ? e.metadata.proof : 'unknown');
        case ErrorCode.PROOF_ALREADY_CLAIMED:
        case ErrorCode.STALE_NONCE:
        case ErrorCode.FUTURE_NONCE:
            return new ConflictError(e.reason, e.code);
        case ErrorCode.KERNEL_NOT_ACTIVE:
        case ErrorCode.ILLEGAL_TRANSITION:
            return new ServiceUnavailableError(e.reason, e.code);
        default:
            return new DataIntegrityError(e.reason);
    }
}
