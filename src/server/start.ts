import { getLogger } from "../utils/logger";
import { startServer } from "./server";

async function main(): Promise<void> {
    const running = await startServer();
    const logger = getLogger();

    const shutdown = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, "Shutting down.");
        running.close().catch((error: unknown) => {
            logger.error({ err: error }, "Failed to shut down cleanly.");
            process.exitCode = 1;
        });
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Server failed to start.");
    process.exitCode = 1;
});
