#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config as loadEnv } from "dotenv";
import { loadConfig } from "./config.js";
import { buildHttpApp } from "./http.js";
import createServer, { createDispatcher, createTools } from "./index.js";
import { createLogger } from "./logger.js";

const thisDir = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(thisDir, "..");
for (const file of [".env", ".env.local"]) {
    loadEnv({ path: path.join(projectRoot, file), override: true });
}

async function bootstrap() {
    const config = loadConfig();
    const stdio = process.argv.includes("--stdio");
    const logger = createLogger(config, { stderr: stdio });
    const tools = createTools(config, logger);

    if (stdio) {
        const server = createServer({ tools });
        await server.connect(new StdioServerTransport());
        logger.info("Typhoon guide MCP server running on stdio");
        return;
    }

    const app = await buildHttpApp({
        config,
        dispatcher: createDispatcher(tools, logger),
        logger,
    });

    const close = async () => {
        app.log.info("Shutting down");
        await app.close();
        process.exit(0);
    };
    process.on("SIGINT", close);
    process.on("SIGTERM", close);

    try {
        await app.listen({ port: config.port, host: config.host });
    } catch (err) {
        app.log.error({ err }, "Failed to start typhoon guide MCP server");
        process.exit(1);
    }
}

bootstrap().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
});
