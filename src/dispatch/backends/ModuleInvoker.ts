import * as path from "path";
import type { InvocationResult, PythonModuleBackend } from "../../types.js";
import { InvocationContext, failure, success } from "../InvocationContext.js";
import type { ModuleRunner } from "../PythonModuleRunner.js";

export class ModuleInvoker {
    constructor(private readonly runner: ModuleRunner) {}

    public async invoke(backend: PythonModuleBackend, callable: string, context: InvocationContext): Promise<InvocationResult> {
        const outcome = await this.runner.call({
            module: backend.modulePath,
            callable,
            kwargs: context.arguments,
            cwd: path.resolve(context.baseDir, backend.cwd ?? "."),
            interpreter: backend.interpreter
        }, {
            timeoutMs: context.timeoutMs,
            signal: context.signal
        });

        switch (outcome.status) {
            case "returned":
                return success(outcome.value ?? null);
            case "raised":
                return failure("RuntimeError", `${outcome.errorType}: ${outcome.message}`, {
                    errorType: outcome.errorType,
                    traceback: outcome.traceback
                });
            case "timeout":
                return failure("Timeout", `Call to ${callable} did not finish within ${context.timeoutMs}ms and was killed`);
            case "cancelled":
                return failure("Cancelled", `Call to ${callable} was cancelled by the caller`);
            case "unavailable":
                return failure("RuntimeError", outcome.message, outcome.stderr ? { stderr: outcome.stderr } : undefined);
        }
    }
}
