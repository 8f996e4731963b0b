import type { Diagnostic } from "../types.js";

export type SurfaceErrorCode = "DETECTION_FAILED" | "SCHEMA_INVALID" | "CONFIGURATION_INVALID";

export class SurfaceError extends Error {
    constructor(public readonly code: SurfaceErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * The project root could not be analysed at all: missing, unreadable, or
 * without any source file the detector understands.
 */
export class DetectionError extends SurfaceError {
    constructor(message: string, public readonly projectRoot: string) {
        super("DETECTION_FAILED", message);
    }
}

export interface SchemaIssue {
    path: string;
    message: string;
}

/** The persisted configuration does not have the expected shape. */
export class SchemaError extends SurfaceError {
    constructor(message: string, public readonly issues: SchemaIssue[] = []) {
        super("SCHEMA_INVALID", message);
    }
}

export class InvalidConfigurationError extends SurfaceError {
    constructor(public readonly diagnostics: Diagnostic[]) {
        const errors = diagnostics.filter(d => d.severity === "error");
        const summary = errors
            .slice(0, 5)
            .map(d => `${d.location}: ${d.message}`)
            .join("; ");
        const more = errors.length > 5 ? ` (+${errors.length - 5} more)` : "";
        super("CONFIGURATION_INVALID", `Configuration is invalid: ${summary}${more}`);
    }
}

// Errors raised by Node itself may come from another realm, so these read
// fields instead of checking `instanceof Error`.
export function describeError(error: unknown): string {
    if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
        return error.message;
    }
    return String(error);
}

/** The system error code (`ENOENT`, `ESRCH`, ...) carried by an error, if any. */
export function errorCode(error: unknown): string | undefined {
    if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return undefined;
}
