import Database from 'better-sqlite3';
import { loadConfig } from '../config/Config.js';
import { GovernanceKernel } from '../kernel-core/Kernel.js';
import { SQLiteStateRepository } from '../infrastructure/persistence/SQLiteStateRepository.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { GovernanceServer } from './Server.js';

const EXPIRY_SWEEP_MS = 1000;

async function bootstrap() {
    const config = loadConfig();
    const db = new Database(config.dbPath);

    const kernel = new GovernanceKernel({
        repository: new SQLiteStateRepository(db),
        eventStore: new SQLiteEventStore(db),
        maxDelegationDepth: config.maxDelegationDepth,
        ...(config.stagingTimeoutMs !== undefined ? { stagingTimeoutMs: config.stagingTimeoutMs } : {})
    });
    await kernel.boot();

    const server = new GovernanceServer(kernel, config.port);
    await server.start();

    const sweep = config.stagingTimeoutMs === undefined ? undefined : setInterval(() => {
        kernel.expireStagedTransitions()
            .then(handles => {
                if (handles.length > 0) console.log(`[Server] Expired ${handles.length} staged transition(s)`);
            })
            .catch(e => console.error('[Server] Expiry sweep failed:', e));
    }, EXPIRY_SWEEP_MS);

    const shutdown = () => {
        if (sweep) clearInterval(sweep);
        kernel.halt();
        server.stop()
            .then(() => db.close())
            .catch(e => console.error('[Server] Shutdown failed:', e));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

bootstrap().catch(e => {
    console.error('[Server] Boot failed:', e);
    process.exitCode = 1;
});
