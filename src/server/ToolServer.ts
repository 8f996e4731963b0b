import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { Dispatcher } from "../dispatch/Dispatcher.js";
import type { InvocationResult } from "../types.js";
import { createLogger } from "../utils/StructuredLogger.js";

const logger = createLogger("ToolServer");

export const SERVER_VERSION = "0.1.0";

interface TextResponse {
    [key: string]: unknown;
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
}

/**
 * MCP front of a Dispatcher: `tools/list` mirrors the configuration and
 * `tools/call` forwards to `Dispatcher.invoke`.
 */
export class ToolServer {
    private readonly server: Server;

    constructor(private readonly dispatcher: Dispatcher) {
        this.server = new Server({
            name: dispatcher.configuration.name,
            version: SERVER_VERSION
        }, {
            capabilities: { tools: {} }
        });
        this.setupHandlers();
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: this.dispatcher.listTools()
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
            const result = await this.dispatcher.invoke(
                request.params.name,
                request.params.arguments ?? {},
                { signal: extra.signal }
            );
            return toResponse(result);
        });

        this.server.onerror = error => {
            logger.error("Protocol error", { error });
        };
    }

    public async connect(transport: Transport): Promise<void> {
        await this.server.connect(transport);
        logger.info("Serving tools", {
            name: this.dispatcher.configuration.name,
            backend: this.dispatcher.configuration.backend.kind,
            tools: this.dispatcher.configuration.tools.length
        });
    }

    public async close(): Promise<void> {
        await this.server.close();
    }
}

export function toResponse(result: InvocationResult): TextResponse {
    if (result.status === "success") {
        const payload = result.payload;
        const text = typeof payload === "string" ? payload : JSON.stringify(payload ?? null, null, 2);
        return { content: [{ type: "text", text }] };
    }
    const lines = [`${result.kind}: ${result.message}`];
    if (result.hint) {
        lines.push(result.hint);
    }
    return { isError: true, content: [{ type: "text", text: lines.join("\n") }] };
}
