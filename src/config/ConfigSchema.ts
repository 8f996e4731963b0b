import { z } from "zod";
import { InvalidConfigurationError, SchemaError } from "../errors/Errors.js";
import {
    BACKEND_KINDS,
    BackendConfig,
    BackendKind,
    Configuration,
    HTTP_METHODS,
    HttpMethod,
    JsonValue,
    PARAMETER_TYPES,
    ParameterType,
    ToolDefinition,
    ToolInvocation,
    ToolParameter
} from "../types.js";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(jsonValueSchema),
        z.record(jsonValueSchema)
    ])
);

// Enumerated fields are plain strings; the validator reports unknown values.
const parameterDocumentSchema = z.object({
    name: z.string(),
    type: z.string(),
    description: z.string().optional(),
    required: z.boolean().optional(),
    default: jsonValueSchema.optional()
});

const toolDocumentSchema = z.object({
    name: z.string(),
    description: z.string().optional(),
    parameters: z.array(parameterDocumentSchema).optional(),
    args: z.array(z.string()).optional(),
    endpoint: z.string().optional(),
    method: z.string().optional(),
    function: z.string().optional()
});

const backendDocumentSchema = z.object({
    type: z.string(),
    config: z.object({
        command: z.string().optional(),
        args: z.array(z.string()).optional(),
        cwd: z.string().optional(),
        env: z.record(z.string()).optional(),
        timeout: z.number().optional(),
        base_url: z.string().optional(),
        headers: z.record(z.string()).optional(),
        module: z.string().optional(),
        python: z.string().optional(),
        handler: z.string().optional()
    }).optional()
});

export const configDocumentSchema = z.object({
    name: z.string(),
    description: z.string().optional(),
    backend: backendDocumentSchema,
    tools: z.array(toolDocumentSchema)
});

export type ConfigDocument = z.infer<typeof configDocumentSchema>;
export type ToolDocument = z.infer<typeof toolDocumentSchema>;
export type ParameterDocument = z.infer<typeof parameterDocumentSchema>;
export type BackendDocument = z.infer<typeof backendDocumentSchema>;
export type BackendSettingsDocument = NonNullable<BackendDocument["config"]>;

const BACKEND_KIND_NAMES: ReadonlySet<string> = new Set(BACKEND_KINDS);
const PARAMETER_TYPE_NAMES: ReadonlySet<string> = new Set(PARAMETER_TYPES);

export function isBackendKind(value: string): value is BackendKind {
    return BACKEND_KIND_NAMES.has(value);
}

export function isParameterType(value: string): value is ParameterType {
    return PARAMETER_TYPE_NAMES.has(value);
}

export function normalizeHttpMethod(value: string | undefined): HttpMethod | undefined {
    if (!value) return undefined;
    const upper = value.trim().toUpperCase();
    return HTTP_METHODS.find(method => method === upper);
}

/**
 * Checks the overall shape of a persisted configuration. Throws SchemaError
 * for anything that is not a configuration document at all.
 */
export function parseConfigDocument(raw: unknown): ConfigDocument {
    const parsed = configDocumentSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => ({
            path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
            message: issue.message
        }));
        const first = issues[0];
        throw new SchemaError(
            `Malformed configuration document${first ? ` at ${first.path}: ${first.message}` : ""}`,
            issues
        );
    }
    return parsed.data;
}

export function isParameterRequired(parameter: ParameterDocument): boolean {
    if (parameter.required !== undefined) {
        return parameter.required;
    }
    return parameter.default === undefined || parameter.default === null;
}

export function secondsToMs(seconds: number | undefined): number | undefined {
    if (seconds === undefined) return undefined;
    return Math.round(seconds * 1000);
}

/**
 * Builds the typed model from a document that already passed validation.
 */
export function toConfiguration(document: ConfigDocument): Configuration {
    const backend = toBackend(document.backend);
    return {
        name: document.name,
        description: document.description ?? "",
        backend,
        tools: document.tools.map((tool, index) => toTool(tool, backend.kind, `tools[${index}]`))
    };
}

function toBackend(document: BackendDocument): BackendConfig {
    const settings: BackendSettingsDocument = document.config ?? {};
    const timeoutMs = secondsToMs(settings.timeout);
    const kind = document.type;
    if (!isBackendKind(kind)) {
        throw unnormalizable("backend.type", `Unknown backend type '${kind}'`);
    }
    switch (kind) {
        case "commandline":
            return {
                kind: "commandline",
                executable: settings.command ?? "",
                baseArgs: settings.args ?? [],
                cwd: settings.cwd ?? ".",
                env: settings.env,
                timeoutMs
            };
        case "http":
            return {
                kind: "http",
                baseUrl: settings.base_url ?? "",
                headers: settings.headers,
                timeoutMs
            };
        case "python-module":
            return {
                kind: "python-module",
                modulePath: settings.module ?? "",
                interpreter: settings.python,
                cwd: settings.cwd,
                timeoutMs
            };
        case "external":
            return {
                kind: "external",
                handler: settings.handler ?? "",
                timeoutMs
            };
    }
}

function toTool(tool: ToolDocument, kind: BackendKind, location: string): ToolDefinition {
    return {
        name: tool.name,
        description: tool.description ?? "",
        parameters: (tool.parameters ?? []).map((parameter, index) =>
            toParameter(parameter, `${location}.parameters[${index}]`)),
        invocation: toInvocation(tool, kind, location)
    };
}

function toParameter(parameter: ParameterDocument, location: string): ToolParameter {
    if (!isParameterType(parameter.type)) {
        throw unnormalizable(`${location}.type`, `Unknown parameter type '${parameter.type}'`);
    }
    const normalized: ToolParameter = {
        name: parameter.name,
        type: parameter.type,
        description: parameter.description ?? "",
        required: isParameterRequired(parameter)
    };
    if (parameter.default !== undefined && parameter.default !== null) {
        normalized.default = parameter.default;
    }
    return normalized;
}

function toInvocation(tool: ToolDocument, kind: BackendKind, location: string): ToolInvocation {
    switch (kind) {
        case "commandline":
            return { kind, args: tool.args ?? [] };
        case "http": {
            const method = normalizeHttpMethod(tool.method);
            if (!method || tool.endpoint === undefined) {
                throw unnormalizable(location, "HTTP tool needs an endpoint and a supported method");
            }
            return { kind, endpoint: tool.endpoint, method };
        }
        case "python-module":
            return { kind, callable: tool.function ?? tool.name };
        case "external":
            return { kind };
    }
}

function unnormalizable(location: string, message: string): InvalidConfigurationError {
    return new InvalidConfigurationError([{ severity: "error", location, message }]);
}

/** Inverse of toConfiguration: the persisted form of a typed model. */
export function toDocument(configuration: Configuration): ConfigDocument {
    return {
        name: configuration.name,
        description: configuration.description,
        backend: backendToDocument(configuration.backend),
        tools: configuration.tools.map(toolToDocument)
    };
}

export function isConfiguration(value: unknown): value is Configuration {
    if (typeof value !== "object" || value === null || !("backend" in value) || !("tools" in value)) {
        return false;
    }
    const backend = value.backend;
    return typeof backend === "object" && backend !== null && "kind" in backend && Array.isArray(value.tools);
}

function backendToDocument(backend: BackendConfig): BackendDocument {
    const timeout = backend.timeoutMs === undefined ? undefined : backend.timeoutMs / 1000;
    switch (backend.kind) {
        case "commandline":
            return {
                type: backend.kind,
                config: { command: backend.executable, args: [...backend.baseArgs], cwd: backend.cwd, env: backend.env, timeout }
            };
        case "http":
            return { type: backend.kind, config: { base_url: backend.baseUrl, headers: backend.headers, timeout } };
        case "python-module":
            return {
                type: backend.kind,
                config: { module: backend.modulePath, python: backend.interpreter, cwd: backend.cwd, timeout }
            };
        case "external":
            return { type: backend.kind, config: { handler: backend.handler, timeout } };
    }
}

function toolToDocument(tool: ToolDefinition): ToolDocument {
    const document: ToolDocument = {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters.map(parameter => ({ ...parameter }))
    };
    const invocation = tool.invocation;
    switch (invocation.kind) {
        case "commandline":
            document.args = [...invocation.args];
            break;
        case "http":
            document.endpoint = invocation.endpoint;
            document.method = invocation.method;
            break;
        case "python-module":
            document.function = invocation.callable;
            break;
        case "external":
            break;
    }
    return document;
}
