import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { Dispatcher } from "../dispatch/Dispatcher.js";
import { ToolServer, toResponse } from "../server/ToolServer.js";

function createDispatcher(): Dispatcher {
    return Dispatcher.create({
        name: "host",
        description: "In-process tools",
        backend: { type: "external", config: { handler: "h" } },
        tools: [
            { name: "greet", description: "Sum two numbers", parameters: [{ name: "a", type: "integer" }, { name: "b", type: "integer" }] },
            { name: "ping", description: "Reply with pong" }
        ]
    }, {
        externalHandlers: {
            h: (toolName, args) => {
                if (toolName === "ping") return "pong";
                const a = typeof args.a === "number" ? args.a : 0;
                const b = typeof args.b === "number" ? args.b : 0;
                return { sum: a + b };
            }
        }
    });
}

describe("ToolServer", () => {
    let server: ToolServer;
    let client: Client;

    beforeEach(async () => {
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        server = new ToolServer(createDispatcher());
        client = new Client({ name: "test-client", version: "0.0.0" });
        await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    });

    afterEach(async () => {
        await client.close();
        await server.close();
    });

    it("lists the configured tools", async () => {
        const listed = await client.listTools();
        expect(listed.tools.map(tool => tool.name)).toEqual(["greet", "ping"]);
        expect(listed.tools[0]?.inputSchema).toEqual({
            type: "object",
            properties: {
                a: { type: "integer", description: "" },
                b: { type: "integer", description: "" }
            },
            required: ["a", "b"]
        });
    });

    it("returns structured payloads as indented JSON", async () => {
        const result = await client.callTool({ name: "greet", arguments: { a: 1, b: "2" } });
        expect(result.content).toEqual([{ type: "text", text: "{\n  \"sum\": 3\n}" }]);
        expect(result.isError).toBeFalsy();
    });

    it("returns text payloads verbatim", async () => {
        const result = await client.callTool({ name: "ping", arguments: {} });
        expect(result.content).toEqual([{ type: "text", text: "pong" }]);
    });

    it("reports failures as error results", async () => {
        const result = await client.callTool({ name: "gret", arguments: {} });
        expect(result.isError).toBe(true);
        expect(result.content).toEqual([{ type: "text", text: "UnknownTool: Unknown tool 'gret'\nDid you mean 'greet'?" }]);
    });
});

describe("toResponse", () => {
    it("renders null payloads", () => {
        expect(toResponse({ status: "success", payload: null })).toEqual({ content: [{ type: "text", text: "null" }] });
        expect(toResponse({ status: "success", payload: undefined })).toEqual({ content: [{ type: "text", text: "null" }] });
    });

    it("leaves out a missing hint", () => {
        expect(toResponse({ status: "failure", kind: "BackendError", message: "HTTP 500" })).toEqual({
            isError: true,
            content: [{ type: "text", text: "BackendError: HTTP 500" }]
        });
    });
});
