// Load environment variables BEFORE any other imports
import 'dotenv/config';

import { Server } from "./adapters/http/server";
import { AppContext, createAppContext } from "./app/context";
import { validateEnvironment } from "./config/env-config";
import { errorMessage } from "./domain/errors";
import { logger } from "./utils/logger";

let server: Server | null = null;
let context: AppContext | null = null;

async function shutdown(signal: string): Promise<void> {
    logger().info(`[SIGNAL] ${signal} received. Shutting down.`);
    if (server) {
        await server.close();
    }
    if (context) {
        await context.close();
    }
}

function onSignal(signal: NodeJS.Signals): void {
    shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
            logger().error({ err: error }, '[SIGNAL] Shutdown failed');
            process.exit(1);
        });
}

process.on('SIGTERM', onSignal);
process.on('SIGINT', onSignal);

export async function start(): Promise<Server> {
    validateEnvironment();

    context = createAppContext();
    server = new Server(context);
    await server.listen();
    return server;
}

start().catch((error: unknown) => {
    logger().fatal(`[BOOT] Failed to start: ${errorMessage(error)}`);
    process.exit(1);
});
