import type { CoercedValue, FailureKind, InvocationFailure, InvocationSuccess, ToolDefinition } from "../types.js";

export interface InvocationContext {
    tool: ToolDefinition;
    /** Coerced values of the parameters that are present, defaults applied. */
    arguments: Record<string, CoercedValue>;
    timeoutMs: number;
    signal?: AbortSignal;
    /** Directory relative backend paths resolve against. */
    baseDir: string;
}

export function success(payload: unknown): InvocationSuccess {
    return { status: "success", payload };
}

export function failure(kind: FailureKind, message: string, detail?: Record<string, unknown>): InvocationFailure {
    return detail ? { status: "failure", kind, message, detail } : { status: "failure", kind, message };
}
