import { getLogger } from "../utils/logger";
import { startServer } from "./server";

function parseArgs(argv: string[]): { configPath?: string; port?: number } {
    const options: { configPath?: string; port?: number } = {};

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];
        if (arg === "--config" && argv[i + 1]) {
            options.configPath = argv[i + 1];
            i += 1;
        } else if (arg === "--port" && argv[i + 1]) {
            options.port = Number(argv[i + 1]);
            i += 1;
        }
    }

    return options;
}

async function main(): Promise<void> {
    const server = await startServer(parseArgs(process.argv.slice(2)));

    const shutdown = (signal: NodeJS.Signals): void => {
        getLogger().info({ signal }, "Shutting down.");
        server
            .close()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                getLogger().error({ err: error }, "Shutdown failed.");
                process.exit(1);
            });
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

main().catch((error) => {
    getLogger().error({ err: error }, "Server failed to start.");
    process.exitCode = 1;
});
