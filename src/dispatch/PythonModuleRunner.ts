import * as path from "path";
import { z } from "zod";
import { DEFAULT_PYTHON } from "../config/RuntimeSettings.js";
import { describeError } from "../errors/Errors.js";
import type { CoercedValue } from "../types.js";
import { ProcessResult, runProcess } from "./ProcessRunner.js";

export interface ModuleCallRequest {
    /** File path (relative to cwd) or dotted module name. */
    module: string;
    /** Callable name, or `dotted.module:callable`. */
    callable: string;
    kwargs: Record<string, CoercedValue>;
    cwd?: string;
    interpreter?: string;
}

export interface ModuleCallOptions {
    timeoutMs: number;
    signal?: AbortSignal;
}

export type ModuleCallOutcome =
    | { status: "returned"; value: unknown }
    | { status: "raised"; errorType: string; message: string; traceback?: string }
    | { status: "timeout" }
    | { status: "cancelled" }
    | { status: "unavailable"; message: string; stderr?: string };

/** Calls a function in a Python module and reports how the call ended. */
export interface ModuleRunner {
    call(request: ModuleCallRequest, options: ModuleCallOptions): Promise<ModuleCallOutcome>;
}

const bridgeReplySchema = z.union([
    z.object({ ok: z.literal(true), result: z.unknown() }),
    z.object({
        ok: z.literal(false),
        error_type: z.string(),
        message: z.string(),
        traceback: z.string().optional()
    })
]);

export const DEFAULT_BRIDGE_SCRIPT = path.resolve(__dirname, "../../runtime/invoke_callable.py");

export interface PythonBridgeRunnerOptions {
    interpreter?: string;
    bridgeScript?: string;
}

/**
 * Runs the bundled bridge script under an interpreter: the request goes in
 * as JSON on stdin, the reply comes back as the last JSON line on stdout.
 */
export class PythonBridgeRunner implements ModuleRunner {
    private readonly interpreter: string;
    private readonly bridgeScript: string;

    constructor(options: PythonBridgeRunnerOptions = {}) {
        this.interpreter = options.interpreter ?? DEFAULT_PYTHON;
        this.bridgeScript = options.bridgeScript ?? DEFAULT_BRIDGE_SCRIPT;
    }

    public async call(request: ModuleCallRequest, options: ModuleCallOptions): Promise<ModuleCallOutcome> {
        const interpreter = request.interpreter ?? this.interpreter;
        let result: ProcessResult;
        try {
            result = await runProcess({
                command: interpreter,
                args: [this.bridgeScript],
                cwd: request.cwd,
                input: JSON.stringify({
                    module: request.module,
                    function: request.callable,
                    kwargs: request.kwargs
                }),
                timeoutMs: options.timeoutMs,
                signal: options.signal
            });
        } catch (error) {
            return { status: "unavailable", message: `Could not start ${interpreter}: ${describeError(error)}` };
        }

        if (result.timedOut) return { status: "timeout" };
        if (result.cancelled) return { status: "cancelled" };

        const reply = parseReply(result.stdout);
        if (!reply) {
            return {
                status: "unavailable",
                message: `Bridge produced no valid reply (exit code ${result.exitCode ?? result.signal ?? "unknown"})`,
                stderr: result.stderr
            };
        }
        if (reply.ok) {
            return { status: "returned", value: reply.result };
        }
        return {
            status: "raised",
            errorType: reply.error_type,
            message: reply.message,
            traceback: reply.traceback
        };
    }
}

function parseReply(stdout: string): z.infer<typeof bridgeReplySchema> | undefined {
    const lines = stdout.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
    const last = lines[lines.length - 1];
    if (last === undefined) return undefined;
    let parsed: unknown;
    try {
        parsed = JSON.parse(last);
    } catch {
        return undefined;
    }
    const reply = bridgeReplySchema.safeParse(parsed);
    return reply.success ? reply.data : undefined;
}
