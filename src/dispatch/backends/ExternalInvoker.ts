import { describeError } from "../../errors/Errors.js";
import type { CoercedValue, ExternalBackend, InvocationResult } from "../../types.js";
import { InvocationContext, failure, success } from "../InvocationContext.js";

export interface ExternalHandlerContext {
    signal: AbortSignal;
    timeoutMs: number;
}

/** Host-provided implementation behind an `external` backend. */
export type ExternalHandler = (
    toolName: string,
    args: Record<string, CoercedValue>,
    context: ExternalHandlerContext
) => unknown;

type Settled =
    | { status: "returned"; value: unknown }
    | { status: "threw"; error: unknown }
    | { status: "timeout" }
    | { status: "cancelled" };

export class ExternalInvoker {
    constructor(private readonly handlers: ReadonlyMap<string, ExternalHandler>) {}

    public async invoke(backend: ExternalBackend, context: InvocationContext): Promise<InvocationResult> {
        const handler = this.handlers.get(backend.handler);
        if (!handler) {
            return failure("RuntimeError", `No external handler registered under '${backend.handler}'`);
        }

        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        let onAbort: (() => void) | undefined;

        const stopped = new Promise<Settled>(resolve => {
            timer = setTimeout(() => resolve({ status: "timeout" }), context.timeoutMs);
            onAbort = () => resolve({ status: "cancelled" });
            if (context.signal?.aborted) {
                onAbort();
            } else {
                context.signal?.addEventListener("abort", onAbort, { once: true });
            }
        });
        const ran = (async (): Promise<Settled> => {
            try {
                const value = await handler(context.tool.name, { ...context.arguments }, {
                    signal: controller.signal,
                    timeoutMs: context.timeoutMs
                });
                return { status: "returned", value };
            } catch (error) {
                return { status: "threw", error };
            }
        })();

        const settled = await Promise.race([ran, stopped]);
        clearTimeout(timer);
        if (onAbort) context.signal?.removeEventListener("abort", onAbort);

        switch (settled.status) {
            case "returned":
                return success(settled.value ?? null);
            case "threw":
                return failure("BackendError", `Handler '${backend.handler}' failed: ${describeError(settled.error)}`);
            case "timeout":
                controller.abort();
                return failure("Timeout", `Handler '${backend.handler}' did not finish within ${context.timeoutMs}ms`);
            case "cancelled":
                controller.abort();
                return failure("Cancelled", `Handler '${backend.handler}' was cancelled by the caller`);
        }
    }
}
