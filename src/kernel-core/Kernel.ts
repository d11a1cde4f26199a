import type { AccountId, Call, ClaimEvent, Extrinsic, KernelState } from './L0/Ontology.js';
import type { IProofStore } from './L2/ProofStore.js';
import { ClaimService } from './L4/ClaimService.js';
import type { IEventSink, ISystemClock } from './L4/ClaimService.js';
import { Authenticator, isAccountId } from './L1/Identity.js';
import { AuditLog } from './L5/Audit.js';
import type { Evidence, EvidenceInput } from './L5/Audit.js';
import { checkRegistryInvariants } from './L0/Invariants.js';
import type { Rejection } from './L0/Invariants.js';
import { fromHex } from './L0/Crypto.js';
import { ErrorCode, KernelError, KernelHalt, isKernelError } from './Errors.js';

export type DispatchOutcome =
    | { ok: true; evidenceId: string; events: ClaimEvent[] }
    | { ok: false; evidenceId: string; error: { code: string; message: string } };

export interface ClaimKernelOptions {
    maxBytesInHash: number;
}

/**
 * Collects the events a single claim operation deposits. Drained after every
 * dispatch, so events never leak from one extrinsic into the next.
 */
class EventBuffer implements IEventSink {
    private pending: ClaimEvent[] = [];

    public deposit(event: ClaimEvent): void {
        this.pending.push(event);
    }

    public drain(): ClaimEvent[] {
        const out = this.pending;
        this.pending = [];
        return out;
    }
}

const TRANSITIONS: Record<KernelState, KernelState[]> = {
    'UNINITIALIZED': ['CONSTITUTED'],
    'CONSTITUTED': ['ACTIVE', 'VIOLATED'],
    'ACTIVE': ['SUSPENDED', 'VIOLATED'],
    'SUSPENDED': ['ACTIVE', 'VIOLATED'],
    'VIOLATED': ['RECOVERED'],
    'RECOVERED': ['ACTIVE', 'VIOLATED']
};

/**
 * ClaimKernel: host-side dispatcher.
 * Authenticates an extrinsic, routes its call to the Claim Service, and
 * records the outcome in the audit log.
 */
export class ClaimKernel {
    private lifecycle: KernelState = 'UNINITIALIZED';
    private readonly buffer = new EventBuffer();
    private readonly service: ClaimService;

    // Pressure Tracker: ErrorCode -> Count
    private rejectionTracker: Map<string, number> = new Map();
    private readonly PRESSURE_THRESHOLD = 5;

    public constructor(
        private readonly store: IProofStore,
        private readonly clock: ISystemClock,
        private readonly authenticator: Authenticator,
        private readonly audit: AuditLog,
        private readonly options: ClaimKernelOptions
    ) {
        this.service = new ClaimService(store, clock, this.buffer, options);
        this.transition('CONSTITUTED');
    }

    public get Lifecycle(): KernelState { return this.lifecycle; }
    public get Store(): IProofStore { return this.store; }
    public get Claims(): ClaimService { return this.service; }
    public get Identity(): Authenticator { return this.authenticator; }
    public get Audit(): AuditLog { return this.audit; }

    private transition(to: KernelState): void {
        const from = this.lifecycle;
        if (from !== 'UNINITIALIZED' && !TRANSITIONS[from].includes(to)) {
            throw new KernelError(ErrorCode.ILLEGAL_TRANSITION, `Illegal State Transition ${from} -> ${to}`);
        }
        this.lifecycle = to;
    }

    /**
     * Certifies the registry before accepting traffic. A registry that fails
     * certification never becomes ACTIVE.
     */
    public boot(): void {
        if (this.lifecycle !== 'CONSTITUTED' && this.lifecycle !== 'RECOVERED') return;
        const violations = this.certify();
        if (violations.length > 0) {
            this.transition('VIOLATED');
            throw new KernelHalt(`Registry failed certification: ${violations.length} violation(s)`, { violations });
        }
        this.transition('ACTIVE');
        console.log(`[ClaimKernel] Active with ${this.store.size} claim(s) at block ${this.clock.now()}.`);
    }

    public certify(): Rejection[] {
        return checkRegistryInvariants({
            snapshot: this.store.snapshot(),
            currentBlock: this.clock.now(),
            maxBytesInHash: this.options.maxBytesInHash
        });
    }

    public suspend(): void { this.transition('SUSPENDED'); }
    public resume(): void { this.transition('ACTIVE'); }

    /**
     * Operator acknowledgement of a fault. The kernel re-certifies on the
     * following boot() before it accepts traffic again.
     */
    public recover(): void { this.transition('RECOVERED'); }

    public async dispatch(extrinsic: Extrinsic): Promise<DispatchOutcome> {
        if (this.lifecycle !== 'ACTIVE') {
            throw new KernelError(ErrorCode.KERNEL_NOT_ACTIVE, `Cannot dispatch in state ${this.lifecycle}`);
        }
        const blockNumber = this.clock.now();
        if (blockNumber < 1) {
            throw new KernelError(ErrorCode.KERNEL_NOT_ACTIVE, 'Dispatch requires a block under construction');
        }

        // Unauthenticated extrinsics never reach the registry or the ledger.
        const sender = this.authenticator.ensureSigned(extrinsic);
        this.authenticator.consumeNonce(sender, extrinsic.nonce);
        const before = this.store.snapshot();
        const rollback = () => {
            this.store.restore(before);
            this.authenticator.releaseNonce(sender, extrinsic.nonce);
        };

        try {
            this.apply(sender, extrinsic.call);
        } catch (e: unknown) {
            this.buffer.drain();

            if (isKernelError(e) && !(e instanceof KernelHalt)) {
                this.trackPressure(e.code);
                const evidence = await this.record({
                    blockNumber,
                    extrinsic,
                    status: 'REJECT',
                    code: e.code,
                    reason: e.reason
                }, rollback);
                return { ok: false, evidenceId: evidence.evidenceId, error: { code: e.code, message: e.reason } };
            }

            const halt = e instanceof KernelHalt
                ? e
                : new KernelHalt(e instanceof Error ? e.message : String(e));
            console.error(`[ClaimKernel] Fault at block ${blockNumber}: ${halt.reason}`);
            this.transition('VIOLATED');
            try {
                await this.audit.append({
                    blockNumber,
                    extrinsic,
                    status: 'ABORTED',
                    code: halt.code,
                    reason: halt.reason
                });
            } catch (appendError: unknown) {
                console.error(`[ClaimKernel] Could not record fault: ${appendError instanceof Error ? appendError.message : String(appendError)}`);
            }
            throw halt;
        }

        const events = this.buffer.drain();
        const evidence = await this.record({ blockNumber, extrinsic, status: 'SUCCESS', events }, rollback);
        return { ok: true, evidenceId: evidence.evidenceId, events };
    }

    /**
     * The registry never runs ahead of its ledger: an outcome that cannot be
     * recorded is undone, and the kernel halts until an operator recovers it.
     */
    private async record(input: EvidenceInput, rollback: () => void): Promise<Evidence> {
        try {
            return await this.audit.append(input);
        } catch (e: unknown) {
            rollback();
            const reason = `Audit append failed: ${e instanceof Error ? e.message : String(e)}`;
            console.error(`[ClaimKernel] ${reason}`);
            this.transition('VIOLATED');
            throw new KernelHalt(reason, { blockNumber: input.blockNumber, signer: input.extrinsic.signer });
        }
    }

    private apply(sender: AccountId, call: Call): void {
        const kind: string = call.kind;
        const proof = typeof call.proof === 'string' ? fromHex(call.proof) : undefined;
        if (!proof) {
            throw new KernelError(ErrorCode.MALFORMED_CALL, `Call ${kind} carries no decodable proof`);
        }

        switch (call.kind) {
            case 'createClaim':
                return this.service.createClaim(sender, proof);
            case 'transferClaim':
                if (!isAccountId(call.newOwner)) {
                    throw new KernelError(ErrorCode.MALFORMED_CALL, 'newOwner must be a 32-byte hex public key');
                }
                return this.service.transferClaim(sender, call.newOwner, proof);
            case 'revokeClaim':
                return this.service.revokeClaim(sender, proof);
            default:
                throw new KernelError(ErrorCode.MALFORMED_CALL, `Unknown call ${kind}`);
        }
    }

    private trackPressure(code: string): void {
        const count = (this.rejectionTracker.get(code) ?? 0) + 1;
        this.rejectionTracker.set(code, count);
        if (count > this.PRESSURE_THRESHOLD) {
            console.warn(`[ClaimKernel] Pressure Alert: ${code} rejected ${count} times.`);
        }
    }
}
