import type { Server } from "node:http";
import express, { type ErrorRequestHandler } from "express";
import type { Logger } from "pino";
import { loadAppConfig } from "../config/loadConfig";
import { configureLogger } from "../utils/logger";
import { createApiRouter } from "./routers/api";
import { applyCors } from "./utils/cors";
import { type ServerContext, createServerContext } from "./utils/context";
import { sendError } from "./utils/http";

export interface ServerOptions {
    configPath?: string;
    port?: number;
}

type ExpressApp = ReturnType<typeof express>;

export interface RunningServer {
    app: ExpressApp;
    context: ServerContext;
    port: number;
    close(): Promise<void>;
}

function httpStatusOf(error: unknown): number {
    if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
        return error.status;
    }
    return 500;
}

function createErrorHandler(logger: Logger): ErrorRequestHandler {
    return (error: unknown, _req, res, next) => {
        if (res.headersSent) {
            next(error);
            return;
        }

        const status = httpStatusOf(error);
        if (status >= 500) {
            logger.error({ err: error }, "Unhandled request error.");
        }
        sendError(
            res,
            status,
            status === 413 ? "Request body too large." : status === 400 ? "Malformed request body." : "Internal server error."
        );
    };
}

export function createApp(context: ServerContext, logger: Logger): ExpressApp {
    const app = express();
    app.use(express.json({ limit: context.config.server.maxUploadBytes }));
    app.use(applyCors);
    app.use("/api", createApiRouter(context, logger));
    app.use(createErrorHandler(logger));
    return app;
}

export async function createServer(options: ServerOptions = {}): Promise<{ app: ExpressApp; context: ServerContext; logger: Logger }> {
    const config = await loadAppConfig(options.configPath);
    const logger = configureLogger(config.logging);
    logger.info({ backend: config.vectorIndex.backend, embedding: config.embedding.provider }, "Loaded server configuration.");

    const context = createServerContext(config, logger);
    await context.index.ensureCollection();

    return { app: createApp(context, logger), context, logger };
}

export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
    const { app, context, logger } = await createServer(options);
    const port = options.port ?? context.config.server.port;

    const server: Server = await new Promise((resolve, reject) => {
        const listener = app
            .listen(port, () => {
                listener.off("error", reject);
                resolve(listener);
            })
            .on("error", reject);
    });

    logger.info({ port }, "Server listening.");

    return {
        app,
        context,
        port,
        close: async () => {
            await new Promise<void>((resolve, reject) => {
                server.close((error) => {
                    if (error) {
                        reject(error);
                    } else {
                        resolve();
                    }
                });
            });
            await context.index.close();
        },
    };
}
