import type { ClaimKernel } from '../Kernel.js';
import type { Sequencer } from '../L3/Sequencer.js';
import { decodeEvent } from '../L5/Audit.js';
import type { Evidence } from '../L5/Audit.js';
import { ErrorCode, KernelError } from '../Errors.js';

export interface ReplaySummary {
    entries: number;
    applied: number;
    height: number;
}

export class ReplayEngine {
    /**
     * Replays the kernel's AuditLog onto its store, nonce memory and sequencer.
     * WARNING: This should be used on a fresh, not yet booted kernel.
     */
    public async replay(kernel: ClaimKernel, sequencer: Sequencer): Promise<ReplaySummary> {
        if (kernel.Lifecycle !== 'CONSTITUTED') {
            throw new KernelError(ErrorCode.REPLAY_FAILURE, `Replay requires a CONSTITUTED kernel, found ${kernel.Lifecycle}`);
        }
        if (!(await kernel.Audit.verifyChain())) {
            throw new KernelError(ErrorCode.INTEGRITY_BREACH, 'Audit chain failed verification');
        }

        const history = await kernel.Audit.getHistory();
        console.log(`[ReplayEngine] Starting replay of ${history.length} entries...`);

        let applied = 0;
        let height = 0;
        for (const entry of history) {
            if (entry.blockNumber < height) {
                throw new KernelError(ErrorCode.REPLAY_FAILURE, `Block ${entry.blockNumber} follows block ${height}`);
            }
            height = entry.blockNumber;

            // Every authenticated extrinsic consumed a nonce, whatever its outcome.
            kernel.Identity.registerNonce(entry.extrinsic.signer, entry.extrinsic.nonce);

            if (entry.status === 'SUCCESS') {
                try {
                    this.applyTrusted(kernel, entry);
                } catch (e: unknown) {
                    const msg = e instanceof Error ? e.message : String(e);
                    throw new KernelError(ErrorCode.REPLAY_FAILURE, `Replay Failure at ${entry.evidenceId}: ${msg}`);
                }
                applied++;
            }
        }

        sequencer.restoreHeight(height);
        console.log(`[ReplayEngine] Replay complete. ${applied} transition(s) applied, height ${height}.`);
        return { entries: history.length, applied, height };
    }

    // Events were validated at original dispatch; they are applied straight to the store.
    private applyTrusted(kernel: ClaimKernel, entry: Evidence): void {
        const store = kernel.Store;
        for (const record of entry.events) {
            const event = decodeEvent(record);
            switch (event.kind) {
                case 'ClaimCreated':
                    store.insert(event.proof, { owner: event.who, createdAt: entry.blockNumber });
                    break;
                case 'ClaimTransfered':
                    store.setOwner(event.proof, event.to);
                    break;
                case 'ClaimRevoked':
                    store.remove(event.proof);
                    break;
            }
        }
    }
}
