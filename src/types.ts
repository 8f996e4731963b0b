export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export const PARAMETER_TYPES = ["string", "integer", "number", "boolean", "array"] as const;
export type ParameterType = typeof PARAMETER_TYPES[number];

export const BACKEND_KINDS = ["commandline", "http", "python-module", "external"] as const;
export type BackendKind = typeof BACKEND_KINDS[number];

export const HTTP_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE"] as const;
export type HttpMethod = typeof HTTP_METHODS[number];

export interface ToolParameter {
    name: string;
    type: ParameterType;
    description: string;
    required: boolean;
    default?: JsonValue;
}

export interface CommandLineBackend {
    kind: "commandline";
    executable: string;
    baseArgs: string[];
    cwd: string;
    env?: Record<string, string>;
    timeoutMs?: number;
}

export interface HttpBackend {
    kind: "http";
    baseUrl: string;
    headers?: Record<string, string>;
    timeoutMs?: number;
}

export interface PythonModuleBackend {
    kind: "python-module";
    modulePath: string;
    interpreter?: string;
    cwd?: string;
    timeoutMs?: number;
}

export interface ExternalBackend {
    kind: "external";
    handler: string;
    timeoutMs?: number;
}

export type BackendConfig = CommandLineBackend | HttpBackend | PythonModuleBackend | ExternalBackend;

export type ToolInvocation =
    | { kind: "commandline"; args: string[] }
    | { kind: "http"; endpoint: string; method: HttpMethod }
    | { kind: "python-module"; callable: string }
    | { kind: "external" };

export interface ToolDefinition {
    name: string;
    description: string;
    parameters: ToolParameter[];
    invocation: ToolInvocation;
}

export interface Configuration {
    name: string;
    description: string;
    backend: BackendConfig;
    tools: ToolDefinition[];
}

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
    severity: DiagnosticSeverity;
    location: string;
    message: string;
}

export interface ValidationReport {
    isValid: boolean;
    diagnostics: Diagnostic[];
}

export type FailureKind =
    | "UnknownTool"
    | "MissingArgument"
    | "TypeMismatch"
    | "Timeout"
    | "BackendError"
    | "RuntimeError"
    | "Cancelled";

export interface InvocationSuccess {
    status: "success";
    payload: unknown;
}

export interface InvocationFailure {
    status: "failure";
    kind: FailureKind;
    message: string;
    hint?: string;
    detail?: Record<string, unknown>;
}

export type InvocationResult = InvocationSuccess | InvocationFailure;

export type CoercedValue = string | number | boolean | JsonValue[];

// Kept as aliases: MCP SDK result types require an implicit index signature.
export type ToolListing = {
    name: string;
    description: string;
    inputSchema: {
        type: "object";
        properties: Record<string, ParameterSchema>;
        required: string[];
    };
};

export type ParameterSchema = {
    type: ParameterType;
    description: string;
    default?: JsonValue;
    items?: Record<string, never>;
};
