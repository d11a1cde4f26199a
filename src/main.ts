import { loadConfig } from './Platform/Config.js';
import { bootstrapRegistry } from './Platform/RegistryPlatform.js';
import { SQLiteEventStore } from './infrastructure/persistence/SQLiteEventStore.js';
import { ClaimServer } from './server/Server.js';

async function bootstrap() {
    const config = loadConfig();

    const eventStore = new SQLiteEventStore(config.dbPath);
    const { kernel, sequencer } = await bootstrapRegistry({
        maxBytesInHash: config.maxBytesInHash,
        eventStore
    });

    const server = new ClaimServer(kernel, sequencer, config.port);
    await server.start();
    sequencer.start(config.blockTimeMs);

    const shutdown = () => {
        sequencer.stop();
        server.close()
            .then(() => eventStore.close())
            .catch((e: unknown) => console.error('[ClaimServer] Shutdown failed:', e));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

bootstrap().catch((e: unknown) => {
    console.error(e);
    process.exitCode = 1;
});
