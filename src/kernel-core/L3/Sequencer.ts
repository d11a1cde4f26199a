import type { AccountId, BlockNumber, ClaimEvent, Extrinsic } from '../L0/Ontology.js';
import type { ISystemClock } from '../L4/ClaimService.js';
import type { ClaimKernel } from '../Kernel.js';
import { canonicalize, hash } from '../L0/Crypto.js';
import { ErrorCode, KernelError, KernelHalt, isKernelError } from '../Errors.js';

export type ExtrinsicStatus = 'SUCCESS' | 'REJECT' | 'DROPPED';

export interface ExtrinsicReceipt {
    hash: string;
    signer: AccountId;
    status: ExtrinsicStatus;
    evidenceId?: string;
    events: ClaimEvent[];
    error?: { code: string; message: string };
}

export interface BlockReceipt {
    number: BlockNumber;
    extrinsics: ExtrinsicReceipt[];
}

interface PoolEntry {
    hash: string;
    extrinsic: Extrinsic;
}

export function extrinsicHash(extrinsic: Extrinsic): string {
    return hash(canonicalize(extrinsic));
}

/**
 * Sequencer: imposes the total order over extrinsics and supplies logical time.
 * Extrinsics of a block are dispatched one at a time, each awaited before the next.
 */
export class Sequencer implements ISystemClock {
    private height: BlockNumber = 0;
    private building: BlockNumber | null = null;
    private pool: PoolEntry[] = [];
    private kernel?: ClaimKernel;
    private tail: Promise<void> = Promise.resolve();
    private timer?: NodeJS.Timeout;

    public now(): BlockNumber {
        return this.building ?? this.height;
    }

    public get Height(): BlockNumber { return this.height; }
    public get Pending(): number { return this.pool.length; }

    public bind(kernel: ClaimKernel): void {
        this.kernel = kernel;
    }

    /**
     * Replay: continue numbering after the last persisted block.
     */
    public restoreHeight(height: BlockNumber): void {
        if (height < this.height) {
            throw new KernelError(ErrorCode.REPLAY_FAILURE, `Cannot rewind sequencer from ${this.height} to ${height}`);
        }
        this.height = height;
    }

    /**
     * Pool admission. Signature and nonce floor are checked here so that
     * garbage never occupies block space.
     */
    public submit(extrinsic: Extrinsic): string {
        const kernel = this.requireKernel();
        kernel.Identity.ensureSigned(extrinsic, true);

        const h = extrinsicHash(extrinsic);
        if (this.pool.some(entry => entry.hash === h)) {
            throw new KernelError(ErrorCode.STALE_NONCE, `Extrinsic ${h} is already pending`);
        }
        this.pool.push({ hash: h, extrinsic });
        return h;
    }

    /**
     * Seals the next block. Calls are serialized; a failure surfaces through
     * the returned promise without blocking later blocks.
     */
    public produceBlock(): Promise<BlockReceipt> {
        const next = this.tail.then(() => this.seal());
        this.tail = next.then(() => undefined, () => undefined);
        return next;
    }

    public start(blockTimeMs: number): void {
        if (blockTimeMs <= 0 || this.timer) return;
        this.timer = setInterval(() => {
            this.produceBlock().catch((e: unknown) => {
                // A suspended kernel skips the tick; sealing resumes with the kernel.
                if (isKernelError(e) && e.code === ErrorCode.KERNEL_NOT_ACTIVE && this.kernel?.Lifecycle === 'SUSPENDED') return;
                console.error(`[Sequencer] Block production halted: ${e instanceof Error ? e.message : String(e)}`);
                this.stop();
            });
        }, blockTimeMs);
    }

    public stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }

    private async seal(): Promise<BlockReceipt> {
        const kernel = this.requireKernel();
        if (kernel.Lifecycle !== 'ACTIVE') {
            throw new KernelError(ErrorCode.KERNEL_NOT_ACTIVE, `Cannot seal while kernel is ${kernel.Lifecycle}`);
        }
        const number = this.height + 1;
        const batch = this.pool;
        this.pool = [];
        this.building = number;

        const receipts: ExtrinsicReceipt[] = [];
        try {
            for (let i = 0; i < batch.length; i++) {
                const entry = batch[i];
                if (!entry) continue;
                try {
                    const outcome = await kernel.dispatch(entry.extrinsic);
                    receipts.push(outcome.ok
                        ? { hash: entry.hash, signer: entry.extrinsic.signer, status: 'SUCCESS', evidenceId: outcome.evidenceId, events: outcome.events }
                        : { hash: entry.hash, signer: entry.extrinsic.signer, status: 'REJECT', evidenceId: outcome.evidenceId, events: [], error: outcome.error });
                } catch (e: unknown) {
                    if (e instanceof KernelHalt || !isKernelError(e)) {
                        this.pool = [...batch.slice(i + 1), ...this.pool];
                        throw e;
                    }
                    // Failed authentication at dispatch time (e.g. a nonce gap): dropped, not recorded.
                    receipts.push({ hash: entry.hash, signer: entry.extrinsic.signer, status: 'DROPPED', events: [], error: { code: e.code, message: e.reason } });
                }
            }
        } finally {
            // A halted block still consumes its number: its entries are already in the ledger.
            this.height = number;
            this.building = null;
        }

        if (receipts.length > 0) {
            console.log(`[Sequencer] Sealed block #${number} with ${receipts.length} extrinsic(s).`);
        }
        return { number, extrinsics: receipts };
    }

    private requireKernel(): ClaimKernel {
        if (!this.kernel) throw new KernelError(ErrorCode.KERNEL_NOT_ACTIVE, 'Sequencer is not bound to a kernel');
        return this.kernel;
    }
}
