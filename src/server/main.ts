import { loadConfig } from '../config/env.js';
import { Identity } from '../kernel-core/L1/Identity.js';
import { ReplayEngine } from '../kernel-core/L0/Replay.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { RegistryServer } from './Server.js';

async function bootstrap() {
    const config = loadConfig();
    const store = new SQLiteEventStore(config.dbPath);

    console.log(`[RegistryServer] Opening ledger at ${config.dbPath}...`);
    const kernel = new ReplayEngine().open(store, Identity.fromHex(config.owner));

    const server = new RegistryServer(kernel, config.port);
    await server.start();

    const shutdown = () => {
        server.stop()
            .then(() => store.close())
            .catch((e: unknown) => console.error('[RegistryServer] Shutdown failed:', e))
            .finally(() => process.exit(0));
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

bootstrap().catch((e: unknown) => {
    console.error(e);
    process.exit(1);
});
