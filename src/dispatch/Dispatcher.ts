import { ConfigDocument, isConfiguration, parseConfigDocument, toConfiguration, toDocument } from "../config/ConfigSchema.js";
import { DEFAULT_TIMEOUT_MS } from "../config/RuntimeSettings.js";
import { ErrorEnhancer } from "../errors/ErrorEnhancer.js";
import { InvalidConfigurationError, describeError } from "../errors/Errors.js";
import type {
    CoercedValue,
    Configuration,
    InvocationFailure,
    InvocationResult,
    ParameterSchema,
    ToolDefinition,
    ToolListing
} from "../types.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { ConfigValidator } from "../validation/ConfigValidator.js";
import { coerceValue } from "./ArgumentCoercer.js";
import { CommandLineInvoker } from "./backends/CommandLineInvoker.js";
import { ExternalHandler, ExternalInvoker } from "./backends/ExternalInvoker.js";
import { HttpInvoker } from "./backends/HttpInvoker.js";
import { ModuleInvoker } from "./backends/ModuleInvoker.js";
import { InvocationContext, failure } from "./InvocationContext.js";
import { ModuleRunner, PythonBridgeRunner } from "./PythonModuleRunner.js";

const logger = createLogger("Dispatcher");

export interface DispatcherOptions {
    /** Used when the backend declares no timeout. */
    defaultTimeoutMs?: number;
    /** Relative working directories and module paths resolve against this. */
    baseDir?: string;
    moduleRunner?: ModuleRunner;
    /** Handlers an external backend can name, keyed by handler name. */
    externalHandlers?: Record<string, ExternalHandler>;
    fetchImpl?: typeof fetch;
    /** Interpreter for python-module backends that do not name one. */
    pythonExecutable?: string;
}

export interface InvokeOptions {
    signal?: AbortSignal;
}

type Prepared =
    | { ok: true; tool: ToolDefinition; values: Record<string, CoercedValue> }
    | { ok: false; failure: InvocationFailure };

/**
 * Serves tool calls against one validated, frozen configuration. Per-call
 * problems come back as failure results; nothing per-call throws.
 */
export class Dispatcher {
    private readonly toolsByName: ReadonlyMap<string, ToolDefinition>;
    private readonly defaultTimeoutMs: number;
    private readonly baseDir: string;
    private readonly commandLine = new CommandLineInvoker();
    private readonly http: HttpInvoker;
    private readonly module: ModuleInvoker;
    private readonly external: ExternalInvoker;

    private constructor(public readonly configuration: Readonly<Configuration>, options: DispatcherOptions) {
        this.toolsByName = new Map(configuration.tools.map(tool => [tool.name, tool]));
        this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.baseDir = options.baseDir ?? process.cwd();
        this.http = new HttpInvoker(options.fetchImpl);
        this.module = new ModuleInvoker(options.moduleRunner ?? new PythonBridgeRunner({ interpreter: options.pythonExecutable }));
        this.external = new ExternalInvoker(new Map(Object.entries(options.externalHandlers ?? {})));
    }

    /**
     * Validates the document (or typed model) and builds a dispatcher around it. Throws
     * SchemaError for a malformed document and InvalidConfigurationError
     * when validation reports errors.
     */
    public static create(document: Configuration | unknown, options: DispatcherOptions = {}): Dispatcher {
        const parsed: ConfigDocument = isConfiguration(document) ? toDocument(document) : parseConfigDocument(document);
        const report = new ConfigValidator().validate(parsed);
        for (const diagnostic of report.diagnostics) {
            if (diagnostic.severity === "warning") {
                logger.warn("Configuration warning", { location: diagnostic.location, message: diagnostic.message });
            }
        }
        if (!report.isValid) {
            throw new InvalidConfigurationError(report.diagnostics);
        }
        return new Dispatcher(deepFreeze(toConfiguration(parsed)), options);
    }

    public listTools(): ToolListing[] {
        return this.configuration.tools.map(tool => {
            const properties: Record<string, ParameterSchema> = {};
            for (const parameter of tool.parameters) {
                const schema: ParameterSchema = { type: parameter.type, description: parameter.description };
                if (parameter.default !== undefined) schema.default = parameter.default;
                if (parameter.type === "array") schema.items = {};
                properties[parameter.name] = schema;
            }
            return {
                name: tool.name,
                description: tool.description,
                inputSchema: {
                    type: "object",
                    properties,
                    required: tool.parameters.filter(p => p.required && p.default === undefined).map(p => p.name)
                }
            };
        });
    }

    public async invoke(toolName: string, args: Record<string, unknown> = {}, options: InvokeOptions = {}): Promise<InvocationResult> {
        const startedAt = Date.now();
        const prepared = this.prepare(toolName, args);
        if (!prepared.ok) {
            logger.debug("Invocation rejected", { tool: toolName, kind: prepared.failure.kind });
            return prepared.failure;
        }

        const { tool, values } = prepared;
        if (options.signal?.aborted) {
            return failure("Cancelled", `Call to ${tool.name} was cancelled before it started`);
        }
        const timeoutMs = this.configuration.backend.timeoutMs ?? this.defaultTimeoutMs;
        const context: InvocationContext = {
            tool,
            arguments: values,
            timeoutMs,
            signal: options.signal,
            baseDir: this.baseDir
        };

        logger.debug("Invocation started", { tool: tool.name, backend: this.configuration.backend.kind });
        let result: InvocationResult;
        try {
            result = await this.execute(context);
        } catch (error) {
            logger.error("Backend invoker threw unexpectedly", { tool: tool.name, error });
            result = failure("RuntimeError", `Unexpected dispatcher error: ${describeError(error)}`);
        }
        if (result.status === "failure" && result.kind === "Timeout" && result.hint === undefined) {
            result = { ...result, hint: ErrorEnhancer.enhanceTimeout(timeoutMs) };
        }

        logger.debug("Invocation finished", {
            tool: tool.name,
            status: result.status,
            kind: result.status === "failure" ? result.kind : undefined,
            durationMs: Date.now() - startedAt
        });
        return result;
    }

    private prepare(toolName: string, args: Record<string, unknown>): Prepared {
        const tool = this.toolsByName.get(toolName);
        if (!tool) {
            return {
                ok: false,
                failure: {
                    ...failure("UnknownTool", `Unknown tool '${toolName}'`),
                    hint: ErrorEnhancer.enhanceUnknownTool(toolName, [...this.toolsByName.keys()])
                }
            };
        }

        const declared = new Set(tool.parameters.map(p => p.name));
        const undeclared = Object.keys(args).filter(name => !declared.has(name));
        if (undeclared.length > 0) {
            logger.debug("Ignoring undeclared arguments", { tool: tool.name, arguments: undeclared });
        }

        const values: Record<string, CoercedValue> = {};
        const missing: string[] = [];
        for (const parameter of tool.parameters) {
            const supplied = Object.prototype.hasOwnProperty.call(args, parameter.name) ? args[parameter.name] : undefined;
            if (supplied === undefined || supplied === null) {
                if (parameter.default !== undefined) {
                    const coercedDefault = coerceValue(parameter.default, parameter.type);
                    if (!coercedDefault.ok) {
                        return {
                            ok: false,
                            failure: failure("TypeMismatch", `Default for '${parameter.name}': ${coercedDefault.message}`, {
                                parameter: parameter.name,
                                expected: parameter.type
                            })
                        };
                    }
                    values[parameter.name] = coercedDefault.value;
                } else if (parameter.required) {
                    missing.push(parameter.name);
                }
                continue;
            }

            const coerced = coerceValue(supplied, parameter.type);
            if (!coerced.ok) {
                return {
                    ok: false,
                    failure: {
                        ...failure("TypeMismatch", `Argument '${parameter.name}': ${coerced.message}`, {
                            parameter: parameter.name,
                            expected: parameter.type
                        }),
                        hint: ErrorEnhancer.enhanceArgumentFailure(tool)
                    }
                };
            }
            values[parameter.name] = coerced.value;
        }

        if (missing.length > 0) {
            const label = missing.length === 1 ? "argument" : "arguments";
            return {
                ok: false,
                failure: {
                    ...failure("MissingArgument", `Missing required ${label}: ${missing.join(", ")}`, { missing }),
                    hint: ErrorEnhancer.enhanceArgumentFailure(tool)
                }
            };
        }
        return { ok: true, tool, values };
    }

    private execute(context: InvocationContext): Promise<InvocationResult> {
        const backend = this.configuration.backend;
        const invocation = context.tool.invocation;
        switch (backend.kind) {
            case "commandline":
                if (invocation.kind !== "commandline") break;
                return this.commandLine.invoke(backend, invocation.args, context);
            case "http":
                if (invocation.kind !== "http") break;
                return this.http.invoke(backend, invocation.endpoint, invocation.method, context);
            case "python-module":
                if (invocation.kind !== "python-module") break;
                return this.module.invoke(backend, invocation.callable, context);
            case "external":
                return this.external.invoke(backend, context);
        }
        return Promise.resolve(failure("RuntimeError", `Tool '${context.tool.name}' does not match the ${backend.kind} backend`));
    }
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
