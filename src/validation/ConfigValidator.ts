import {
    BackendSettingsDocument,
    ConfigDocument,
    ParameterDocument,
    ToolDocument,
    isBackendKind,
    isParameterRequired,
    isParameterType,
    normalizeHttpMethod,
    parseConfigDocument
} from "../config/ConfigSchema.js";
import { collectPlaceholders } from "../config/Placeholders.js";
import { coerceValue } from "../dispatch/ArgumentCoercer.js";
import {
    BACKEND_KINDS,
    BackendKind,
    Diagnostic,
    HTTP_METHODS,
    PARAMETER_TYPES,
    ValidationReport
} from "../types.js";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const BACKEND_FIELDS: Record<BackendKind, ReadonlyArray<keyof BackendSettingsDocument>> = {
    commandline: ["command", "args", "cwd", "env", "timeout"],
    http: ["base_url", "headers", "timeout"],
    "python-module": ["module", "python", "cwd", "timeout"],
    external: ["handler", "timeout"]
};

type InvocationField = "args" | "endpoint" | "method" | "function";
const INVOCATION_FIELDS: readonly InvocationField[] = ["args", "endpoint", "method", "function"];

const TOOL_FIELDS: Record<BackendKind, readonly InvocationField[]> = {
    commandline: ["args"],
    http: ["endpoint", "method"],
    "python-module": ["function"],
    external: []
};

/**
 * Semantic checks over a configuration document. Pure: the same document
 * always yields the same report.
 */
export class ConfigValidator {
    public validate(document: ConfigDocument): ValidationReport {
        const diagnostics: Diagnostic[] = [];
        const kind = document.backend.type;
        const knownKind = isBackendKind(kind) ? kind : undefined;

        if (!knownKind) {
            diagnostics.push(error(
                "backend.type",
                `Unknown backend type '${kind}'; expected one of ${BACKEND_KINDS.join(", ")}`
            ));
        } else {
            this.checkBackend(document.backend.config ?? {}, knownKind, diagnostics);
        }

        const firstIndexByName = new Map<string, number>();
        document.tools.forEach((tool, index) => {
            const location = `tools[${index}]`;
            this.checkToolName(tool, location, firstIndexByName, index, diagnostics);
            this.checkParameters(tool.parameters ?? [], location, diagnostics);
            if (knownKind) {
                this.checkInvocation(tool, knownKind, location, diagnostics);
            }
        });

        return {
            isValid: diagnostics.every(d => d.severity !== "error"),
            diagnostics
        };
    }

    private checkBackend(settings: BackendSettingsDocument, kind: BackendKind, diagnostics: Diagnostic[]): void {
        switch (kind) {
            case "commandline":
                if (!settings.command?.trim()) {
                    diagnostics.push(error("backend.config.command", "Command-line backend needs a command"));
                }
                break;
            case "http":
                if (!settings.base_url?.trim()) {
                    diagnostics.push(error("backend.config.base_url", "HTTP backend needs a base_url"));
                } else if (!isHttpUrl(settings.base_url)) {
                    diagnostics.push(error(
                        "backend.config.base_url",
                        `'${settings.base_url}' is not an absolute http(s) URL`
                    ));
                }
                break;
            case "python-module":
                if (!settings.module?.trim()) {
                    diagnostics.push(error("backend.config.module", "Module backend needs a module path"));
                }
                break;
            case "external":
                if (!settings.handler?.trim()) {
                    diagnostics.push(error("backend.config.handler", "External backend needs a handler name"));
                }
                break;
        }

        if (settings.timeout !== undefined && !(settings.timeout > 0)) {
            diagnostics.push(error("backend.config.timeout", "Timeout must be a positive number of seconds"));
        }

        const allowed = BACKEND_FIELDS[kind];
        for (const key of Object.keys(settings).sort()) {
            if (!isSettingsKey(key) || allowed.includes(key)) continue;
            if (settings[key] === undefined) continue;
            diagnostics.push(warning(`backend.config.${key}`, `Field '${key}' does not apply to ${kind} backends`));
        }
    }

    private checkToolName(
        tool: ToolDocument,
        location: string,
        firstIndexByName: Map<string, number>,
        index: number,
        diagnostics: Diagnostic[]
    ): void {
        const name = tool.name;
        if (name.trim().length === 0) {
            diagnostics.push(error(`${location}.name`, "Tool name must not be empty"));
            return;
        }
        if (!IDENTIFIER.test(name)) {
            diagnostics.push(error(`${location}.name`, `Tool name '${name}' is not identifier-safe`));
        }
        const firstIndex = firstIndexByName.get(name);
        if (firstIndex !== undefined) {
            diagnostics.push(error(
                `${location}.name`,
                `Duplicate tool name '${name}' (first declared at tools[${firstIndex}])`
            ));
        } else {
            firstIndexByName.set(name, index);
        }
    }

    private checkParameters(parameters: ParameterDocument[], location: string, diagnostics: Diagnostic[]): void {
        const seen = new Set<string>();
        parameters.forEach((parameter, index) => {
            const paramLocation = `${location}.parameters[${index}]`;
            if (parameter.name.trim().length === 0) {
                diagnostics.push(error(`${paramLocation}.name`, "Parameter name must not be empty"));
            } else if (seen.has(parameter.name)) {
                diagnostics.push(error(`${paramLocation}.name`, `Duplicate parameter name '${parameter.name}'`));
            } else {
                seen.add(parameter.name);
            }

            if (!isParameterType(parameter.type)) {
                diagnostics.push(error(
                    `${paramLocation}.type`,
                    `Unknown parameter type '${parameter.type}'; expected one of ${PARAMETER_TYPES.join(", ")}`
                ));
            } else if (parameter.default !== undefined && parameter.default !== null) {
                const coerced = coerceValue(parameter.default, parameter.type);
                if (!coerced.ok) {
                    diagnostics.push(warning(`${paramLocation}.default`, `Default does not fit the declared type: ${coerced.message}`));
                }
            }
        });
    }

    private checkInvocation(tool: ToolDocument, kind: BackendKind, location: string, diagnostics: Diagnostic[]): void {
        for (const field of INVOCATION_FIELDS) {
            if (tool[field] !== undefined && !TOOL_FIELDS[kind].includes(field)) {
                diagnostics.push(warning(`${location}.${field}`, `Field '${field}' does not apply to ${kind} tools`));
            }
        }

        const parameters = tool.parameters ?? [];
        const declared = new Set(parameters.map(p => p.name));
        let referenced: Set<string> | undefined;

        if (kind === "commandline") {
            referenced = collectPlaceholders(tool.args ?? []);
            this.checkReferences(referenced, declared, `${location}.args`, diagnostics);
        } else if (kind === "http") {
            if (tool.endpoint === undefined) {
                diagnostics.push(error(`${location}.endpoint`, "HTTP tool needs an endpoint"));
            }
            if (tool.method === undefined) {
                diagnostics.push(error(`${location}.method`, "HTTP tool needs a method"));
            } else if (!normalizeHttpMethod(tool.method)) {
                diagnostics.push(error(
                    `${location}.method`,
                    `Unsupported HTTP method '${tool.method}'; expected one of ${HTTP_METHODS.join(", ")}`
                ));
            }
            referenced = collectPlaceholders(tool.endpoint === undefined ? [] : [tool.endpoint]);
            this.checkReferences(referenced, declared, `${location}.endpoint`, diagnostics);
        }

        if (!referenced) {
            // Module and external tools receive every parameter by name.
            return;
        }

        parameters.forEach((parameter, index) => {
            if (referenced?.has(parameter.name)) return;
            const paramLocation = `${location}.parameters[${index}]`;
            const hasDefault = parameter.default !== undefined && parameter.default !== null;
            if (isParameterRequired(parameter) && !hasDefault) {
                diagnostics.push(error(
                    paramLocation,
                    `Required parameter '${parameter.name}' is not referenced by the invocation template`
                ));
            } else if (kind === "commandline") {
                diagnostics.push(warning(paramLocation, `Optional parameter '${parameter.name}' is never passed to the command`));
            }
        });
    }

    private checkReferences(referenced: Set<string>, declared: Set<string>, location: string, diagnostics: Diagnostic[]): void {
        for (const name of referenced) {
            if (!declared.has(name)) {
                diagnostics.push(error(location, `Placeholder '{${name}}' does not name a declared parameter`));
            }
        }
    }
}

/**
 * Parses then validates. Throws SchemaError when the input is not shaped
 * like a configuration document.
 */
export function validateConfig(raw: unknown): ValidationReport {
    return new ConfigValidator().validate(parseConfigDocument(raw));
}

function isHttpUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === "http:" || url.protocol === "https:";
    } catch {
        return false;
    }
}

const SETTINGS_KEYS: ReadonlyArray<keyof BackendSettingsDocument> = [
    "command", "args", "cwd", "env", "timeout", "base_url", "headers", "module", "python", "handler"
];

const SETTINGS_KEY_NAMES: ReadonlySet<string> = new Set(SETTINGS_KEYS);

function isSettingsKey(key: string): key is keyof BackendSettingsDocument {
    return SETTINGS_KEY_NAMES.has(key);
}

function error(location: string, message: string): Diagnostic {
    return { severity: "error", location, message };
}

function warning(location: string, message: string): Diagnostic {
    return { severity: "warning", location, message };
}
