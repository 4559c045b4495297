import { createApp } from './app.js';
import { getConfig } from './config/env.js';
import { buildContainer } from './container.js';
import { errorMessage } from './lib/errors/app-errors.js';
import { createLogger } from './lib/logger/structured-logger.js';

async function main(): Promise<void> {
    const config = getConfig();
    const logger = createLogger(config.logLevel);
    const container = await buildContainer(config, logger);

    const app = createApp(container.deps);
    const server = app.listen(config.port, () => {
        logger.info({ event: 'server_listening', port: config.port, env: config.env }, `[Server] Listening on http://localhost:${config.port}`);
    });

    let shuttingDown = false;
    function shutdown(signal: NodeJS.Signals) {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info({ event: 'server_shutdown', signal }, `[Server] Received ${signal}, shutting down`);

        server.close(() => {
            container.close().then(
                () => {
                    logger.info({ event: 'server_closed' }, '[Server] Closed');
                    process.exit(0);
                },
                (err: unknown) => {
                    logger.error({ event: 'server_close_failed', error: errorMessage(err) }, '[Server] Error while closing resources');
                    process.exit(1);
                }
            );
        });
    }

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
    createLogger().fatal({ event: 'server_start_failed', error: errorMessage(err) }, '[Server] Startup failed');
    process.exit(1);
});
