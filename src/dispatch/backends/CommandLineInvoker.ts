import { promises as fs } from "fs";
import * as path from "path";
import {
    extractPlaceholders,
    isFlagToken,
    substitutePlaceholders,
    wholePlaceholder
} from "../../config/Placeholders.js";
import { describeError, errorCode } from "../../errors/Errors.js";
import type { CoercedValue, CommandLineBackend, InvocationResult } from "../../types.js";
import { createLogger } from "../../utils/StructuredLogger.js";
import { renderScalar } from "../ArgumentCoercer.js";
import { InvocationContext, failure, success } from "../InvocationContext.js";
import { ProcessResult, runProcess } from "../ProcessRunner.js";

const logger = createLogger("CommandLineInvoker");

/**
 * Base args followed by the rendered template. Omitted optional values and
 * empty arrays drop their token and a flag directly before it; a boolean
 * right after a flag is a switch.
 */
export function renderArgv(
    baseArgs: readonly string[],
    template: readonly string[],
    values: Readonly<Record<string, CoercedValue>>
): string[] {
    const argv: string[] = [];
    template.forEach((token, index) => {
        const followsFlag = index > 0 && isFlagToken(template[index - 1]);
        const name = wholePlaceholder(token);

        if (name !== undefined) {
            const value = values[name];
            if (value === undefined) {
                if (followsFlag) argv.pop();
                return;
            }
            if (typeof value === "boolean" && followsFlag) {
                if (!value) argv.pop();
                return;
            }
            if (Array.isArray(value)) {
                if (value.length === 0 && followsFlag) argv.pop();
                argv.push(...value.map(renderScalar));
                return;
            }
            argv.push(String(value));
            return;
        }

        const names = extractPlaceholders(token);
        if (names.some(placeholderName => values[placeholderName] === undefined)) {
            if (followsFlag) argv.pop();
            return;
        }
        argv.push(substitutePlaceholders(token, placeholderName => renderEmbedded(values[placeholderName])));
    });
    return [...baseArgs, ...argv];
}

function renderEmbedded(value: CoercedValue | undefined): string {
    if (value === undefined) return "";
    if (Array.isArray(value)) return value.map(renderScalar).join(",");
    return String(value);
}

export class CommandLineInvoker {
    public async invoke(backend: CommandLineBackend, template: readonly string[], context: InvocationContext): Promise<InvocationResult> {
        const argv = renderArgv(backend.baseArgs, template, context.arguments);
        const cwd = path.resolve(context.baseDir, backend.cwd);

        try {
            const stat = await fs.stat(cwd);
            if (!stat.isDirectory()) {
                return failure("RuntimeError", `Working directory is not a directory: ${cwd}`);
            }
        } catch {
            return failure("RuntimeError", `Working directory does not exist: ${cwd}`);
        }

        let result: ProcessResult;
        try {
            result = await runProcess({
                command: backend.executable,
                args: argv,
                cwd,
                env: backend.env,
                timeoutMs: context.timeoutMs,
                signal: context.signal
            });
        } catch (error) {
            const code = errorCode(error);
            const message = code === "ENOENT"
                ? `Executable not found: ${backend.executable}`
                : `Could not start ${backend.executable}: ${describeError(error)}`;
            return failure("RuntimeError", message, { executable: backend.executable, code });
        }

        if (result.stdoutTruncated || result.stderrTruncated) {
            logger.warn("Captured output was truncated", { tool: context.tool.name });
        }

        const output = {
            stdout: result.stdout,
            stderr: result.stderr,
            truncated: result.stdoutTruncated || result.stderrTruncated
        };
        if (result.timedOut) {
            return failure("Timeout", `Command did not finish within ${context.timeoutMs}ms and was killed`, output);
        }
        if (result.cancelled) {
            return failure("Cancelled", "Command was cancelled by the caller and killed", output);
        }
        if (result.exitCode === 0) {
            return success(result.stdout.trimEnd());
        }

        const reason = result.exitCode !== null
            ? `Command exited with code ${result.exitCode}`
            : `Command was terminated by ${result.signal ?? "a signal"}`;
        const lastError = lastLine(result.stderr);
        return failure("BackendError", lastError ? `${reason}: ${lastError}` : reason, {
            exitCode: result.exitCode,
            signal: result.signal,
            ...output
        });
    }
}

function lastLine(text: string): string | undefined {
    const lines = text.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
    return lines[lines.length - 1];
}
