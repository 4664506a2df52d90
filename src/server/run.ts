import { loadConfig } from '../config.js';
import { makeLogger } from '../logging.js';
import { SQLiteStateStore } from '../infrastructure/persistence/SQLiteStateStore.js';
import { OwnableRolesSample } from '../Products/Samples/OwnableRolesSample.js';
import { SystemClock } from '../Platform/Ports.js';
import { RequestAuthenticator } from './Authentication.js';
import { AccessServer } from './Server.js';

async function main(): Promise<void> {
    const config = loadConfig();
    const logger = makeLogger({ level: config.logLevel, pretty: config.logPretty });
    const clock = new SystemClock();
    const store = new SQLiteStateStore(config.dbPath);

    const service = new OwnableRolesSample({
        objectId: config.objectId,
        store,
        clock,
        logger,
        handoverValidityMs: config.handoverValidityMs
    });
    logger.info({ objectId: config.objectId, state: service.initializationState }, 'service loaded');

    const server = new AccessServer({
        service,
        authenticator: new RequestAuthenticator({ clock, maxSkewMs: config.authMaxSkewMs }),
        logger
    });
    await server.listen(config.port);

    const shutdown = (signal: string) => {
        logger.info({ signal }, 'shutting down');
        server
            .close()
            .then(() => {
                store.close();
                process.exit(0);
            })
            .catch((err: unknown) => {
                logger.error({ err }, 'shutdown failed');
                process.exit(1);
            });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
    main().catch((err: unknown) => {
        console.error('access-kernel failed to start:', err);
        process.exit(1);
    });
}
