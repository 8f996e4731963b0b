import { jest } from "@jest/globals";
import { ExternalHandler, ExternalHandlerContext, ExternalInvoker } from "../dispatch/backends/ExternalInvoker.js";
import type { InvocationContext } from "../dispatch/InvocationContext.js";
import type { CoercedValue, ExternalBackend } from "../types.js";

const backend: ExternalBackend = { kind: "external", handler: "h" };

function context(values: Record<string, CoercedValue> = {}, overrides: Partial<InvocationContext> = {}): InvocationContext {
    return {
        tool: { name: "lookup", description: "", parameters: [], invocation: { kind: "external" } },
        arguments: values,
        timeoutMs: 5_000,
        baseDir: process.cwd(),
        ...overrides
    };
}

function invoker(handler: ExternalHandler): ExternalInvoker {
    return new ExternalInvoker(new Map([["h", handler]]));
}

describe("ExternalInvoker", () => {
    it("passes the tool name and coerced arguments to the handler", async () => {
        const handler = jest.fn<ExternalHandler>(() => ({ found: true }));
        const result = await invoker(handler).invoke(backend, context({ id: 7 }));

        expect(result).toEqual({ status: "success", payload: { found: true } });
        expect(handler).toHaveBeenCalledTimes(1);
        expect(handler.mock.calls[0]?.[0]).toBe("lookup");
        expect(handler.mock.calls[0]?.[1]).toEqual({ id: 7 });
    });

    it("awaits async handlers and maps undefined to null", async () => {
        const result = await invoker(async () => undefined).invoke(backend, context());
        expect(result).toEqual({ status: "success", payload: null });
    });

    it("reports a throwing handler as a backend error", async () => {
        const result = await invoker(() => { throw new Error("nope"); }).invoke(backend, context());
        expect(result).toEqual({ status: "failure", kind: "BackendError", message: "Handler 'h' failed: nope" });
    });

    it("reports a handler that is not registered", async () => {
        const result = await invoker(() => null).invoke({ kind: "external", handler: "missing" }, context());
        expect(result).toEqual({ status: "failure", kind: "RuntimeError", message: "No external handler registered under 'missing'" });
    });

    it("times out and aborts the handler's signal", async () => {
        let seen: ExternalHandlerContext | undefined;
        const handler: ExternalHandler = (_name, _args, handlerContext) => {
            seen = handlerContext;
            return new Promise(() => undefined);
        };
        const result = await invoker(handler).invoke(backend, context({}, { timeoutMs: 50 }));

        expect(result).toEqual({ status: "failure", kind: "Timeout", message: "Handler 'h' did not finish within 50ms" });
        expect(seen?.timeoutMs).toBe(50);
        expect(seen?.signal.aborted).toBe(true);
    });

    it("stops waiting when the caller cancels", async () => {
        const controller = new AbortController();
        const handler: ExternalHandler = () => {
            controller.abort();
            return new Promise(() => undefined);
        };
        const result = await invoker(handler).invoke(backend, context({}, { signal: controller.signal }));
        expect(result).toEqual({ status: "failure", kind: "Cancelled", message: "Handler 'h' was cancelled by the caller" });
    });
});
