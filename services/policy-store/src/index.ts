#!/usr/bin/env node
import { loadServiceConfig } from "../../../libs/bootstrap/config/service-config.js";
import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { logger } from "../../../libs/logging/logger.js";

async function main() {
    const config = loadServiceConfig();
    const service = await bootstrap(config);

    const server = service.app.listen(config.port, config.host, () => {
        logger.info({ host: config.host, port: config.port }, "Policy store listening");
    });

    let stopping = false;
    const shutdown = (signal: NodeJS.Signals) => {
        if (stopping) return;
        stopping = true;
        logger.info({ signal }, "Shutting down policy store");

        server.close((serverError) => {
            if (serverError) {
                logger.error({ error: serverError }, "Failed to close HTTP server");
            }
            service.close().then(
                () => process.exit(serverError ? 1 : 0),
                (closeError: unknown) => {
                    logger.error({ error: closeError }, "Failed to close policy store");
                    process.exit(1);
                }
            );
        });
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
