import { spawn } from "child_process";
import { errorCode } from "../errors/Errors.js";

export const MAX_CAPTURE_BYTES = 10 * 1024 * 1024;

export interface ProcessRequest {
    command: string;
    args: string[];
    cwd?: string;
    env?: Record<string, string>;
    /** Written to stdin, which is then closed. Without it stdin is ignored. */
    input?: string;
    timeoutMs: number;
    signal?: AbortSignal;
    maxCaptureBytes?: number;
}

export interface ProcessResult {
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
    stdoutTruncated: boolean;
    stderrTruncated: boolean;
    timedOut: boolean;
    cancelled: boolean;
    durationMs: number;
}

class OutputBuffer {
    private readonly chunks: Buffer[] = [];
    private size = 0;
    public truncated = false;

    constructor(private readonly limit: number) {}

    public push(chunk: Buffer): void {
        const room = this.limit - this.size;
        if (room <= 0) {
            this.truncated = true;
            return;
        }
        const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
        if (kept.length < chunk.length) this.truncated = true;
        this.chunks.push(kept);
        this.size += kept.length;
    }

    public toString(): string {
        return Buffer.concat(this.chunks).toString("utf8");
    }
}

/**
 * Spawns a process without a shell, in its own process group on POSIX.
 * A timeout or abort kills the whole group, so descendants holding the
 * output pipes die with it. Resolves once the process has exited and its
 * streams have closed. Rejects only when the process could not be started.
 */
export function runProcess(request: ProcessRequest): Promise<ProcessResult> {
    const startedAt = Date.now();
    const limit = request.maxCaptureBytes ?? MAX_CAPTURE_BYTES;

    if (request.signal?.aborted) {
        return Promise.resolve({
            exitCode: null,
            signal: null,
            stdout: "",
            stderr: "",
            stdoutTruncated: false,
            stderrTruncated: false,
            timedOut: false,
            cancelled: true,
            durationMs: 0
        });
    }

    return new Promise<ProcessResult>((resolve, reject) => {
        const stdout = new OutputBuffer(limit);
        const stderr = new OutputBuffer(limit);
        let timedOut = false;
        let cancelled = false;
        let settled = false;

        const child = spawn(request.command, request.args, {
            cwd: request.cwd,
            env: request.env ? { ...process.env, ...request.env } : process.env,
            stdio: [request.input !== undefined ? "pipe" : "ignore", "pipe", "pipe"],
            shell: false,
            detached: process.platform !== "win32",
            windowsHide: true
        });

        const hasExited = () => child.exitCode !== null || child.signalCode !== null;
        const kill = () => {
            if (child.pid !== undefined && process.platform !== "win32") {
                try {
                    process.kill(-child.pid, "SIGKILL");
                    return;
                } catch (error) {
                    if (errorCode(error) === "ESRCH") return;
                }
            }
            if (!hasExited()) {
                child.kill("SIGKILL");
            }
        };
        // A descendant that escaped the group can still hold the pipes open.
        const releaseStreams = () => {
            child.stdout?.destroy();
            child.stderr?.destroy();
        };
        const terminate = () => {
            kill();
            if (hasExited()) {
                releaseStreams();
            } else {
                child.once("exit", releaseStreams);
            }
        };
        const timer = setTimeout(() => {
            timedOut = true;
            terminate();
        }, request.timeoutMs);
        const onAbort = () => {
            cancelled = true;
            terminate();
        };
        request.signal?.addEventListener("abort", onAbort, { once: true });

        const cleanup = () => {
            settled = true;
            clearTimeout(timer);
            request.signal?.removeEventListener("abort", onAbort);
        };

        child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

        child.on("error", error => {
            if (settled) return;
            cleanup();
            kill();
            reject(error);
        });
        child.on("close", (code, signal) => {
            if (settled) return;
            cleanup();
            resolve({
                exitCode: code,
                signal,
                stdout: stdout.toString(),
                stderr: stderr.toString(),
                stdoutTruncated: stdout.truncated,
                stderrTruncated: stderr.truncated,
                timedOut,
                cancelled: cancelled && !timedOut,
                durationMs: Date.now() - startedAt
            });
        });

        if (request.input !== undefined && child.stdin) {
            // EPIPE when the child exits without reading; the close handler reports the outcome.
            child.stdin.on("error", () => undefined);
            child.stdin.end(request.input);
        }
    });
}
