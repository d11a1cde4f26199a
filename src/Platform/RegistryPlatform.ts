import { ClaimKernel } from '../kernel-core/Kernel.js';
import { ProofStore } from '../kernel-core/L2/ProofStore.js';
import { Sequencer } from '../kernel-core/L3/Sequencer.js';
import { Authenticator } from '../kernel-core/L1/Identity.js';
import { AuditLog } from '../kernel-core/L5/Audit.js';
import type { IEventStore } from '../kernel-core/L5/Audit.js';
import { ReplayEngine } from '../kernel-core/L0/Replay.js';
import type { ReplaySummary } from '../kernel-core/L0/Replay.js';

export interface RegistryPlatformOptions {
    maxBytesInHash: number;
    eventStore?: IEventStore;
}

/**
 * The wired registry: one isolated store, kernel and sequencer per instance.
 */
export interface RegistryPlatform {
    kernel: ClaimKernel;
    sequencer: Sequencer;
    replay: ReplaySummary;
}

/**
 * Builds a registry, rebuilds its state from the event store and boots it.
 */
export async function bootstrapRegistry(options: RegistryPlatformOptions): Promise<RegistryPlatform> {
    const audit = new AuditLog(options.eventStore);
    const sequencer = new Sequencer();
    const kernel = new ClaimKernel(
        new ProofStore(),
        sequencer,
        new Authenticator(),
        audit,
        { maxBytesInHash: options.maxBytesInHash }
    );
    sequencer.bind(kernel);

    const replay = await new ReplayEngine().replay(kernel, sequencer);
    kernel.boot();

    return { kernel, sequencer, replay };
}
