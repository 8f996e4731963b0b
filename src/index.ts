#!/usr/bin/env node
import "./utils/StdoutGuard.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import * as path from "path";
import { loadConfigFile } from "./config/ConfigFile.js";
import { resolveRuntimeSettingsFromEnv } from "./config/RuntimeSettings.js";
import { Dispatcher, DispatcherOptions } from "./dispatch/Dispatcher.js";
import { describeError } from "./errors/Errors.js";
import { ToolServer } from "./server/ToolServer.js";
import { createLogger } from "./utils/StructuredLogger.js";

export { validateConfig, ConfigValidator } from "./validation/ConfigValidator.js";
export { Dispatcher } from "./dispatch/Dispatcher.js";
export type { DispatcherOptions, InvokeOptions } from "./dispatch/Dispatcher.js";
export type { ExternalHandler } from "./dispatch/backends/ExternalInvoker.js";
export { ToolServer } from "./server/ToolServer.js";
export { StructuralDetector } from "./detect/StructuralDetector.js";
export { AssistedDetector } from "./detect/AssistedDetector.js";
export { DetectorRegistry, createDefaultRegistry } from "./detect/DetectorRegistry.js";
export { StrategySelector } from "./detect/StrategySelector.js";
export { parseConfigDocument, toConfiguration, toDocument } from "./config/ConfigSchema.js";
export { resolveRuntimeSettingsFromEnv } from "./config/RuntimeSettings.js";
export { loadConfigFile } from "./config/ConfigFile.js";
export * from "./errors/Errors.js";
export type * from "./types.js";

const logger = createLogger("serve");

/**
 * Serves the configuration at `configPath` over stdio until stdin closes or
 * the process is signalled. Relative paths in the configuration resolve
 * against the file's directory.
 */
export async function serve(configPath: string, options: DispatcherOptions = {}): Promise<ToolServer> {
    const settings = resolveRuntimeSettingsFromEnv();
    const absolute = path.resolve(configPath);
    const dispatcher = Dispatcher.create(loadConfigFile(absolute), {
        defaultTimeoutMs: settings.defaultTimeoutMs,
        pythonExecutable: settings.pythonExecutable,
        baseDir: path.dirname(absolute),
        ...options
    });
    const server = new ToolServer(dispatcher);
    await server.connect(new StdioServerTransport());

    const shutdown = (signal: string) => {
        logger.info("Shutting down", { signal });
        server.close().then(
            () => process.exit(0),
            error => {
                logger.error("Failed to close server", { error });
                process.exit(1);
            }
        );
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    return server;
}

if (require.main === module) {
    const configPath = process.argv[2] ?? process.env.SURFACE_MCP_CONFIG;
    if (!configPath) {
        console.error("Usage: surface-mcp-serve <config.json>");
        process.exitCode = 2;
    } else {
        serve(configPath).catch(error => {
            logger.error("Failed to start server", { error: describeError(error) });
            process.exitCode = 1;
        });
    }
}
