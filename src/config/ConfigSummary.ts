import { ErrorEnhancer } from "../errors/ErrorEnhancer.js";
import type { BackendConfig, Configuration, ToolDefinition } from "../types.js";

/** Plain-text overview of a configuration, one block per tool. */
export function renderSummary(configuration: Configuration): string {
    const lines = [configuration.name];
    if (configuration.description) {
        lines.push(configuration.description);
    }
    lines.push("", `Backend: ${describeBackend(configuration.backend)}`);
    if (configuration.backend.timeoutMs !== undefined) {
        lines.push(`Timeout: ${configuration.backend.timeoutMs / 1000}s`);
    }
    lines.push("", `Tools (${configuration.tools.length}):`);
    for (const tool of configuration.tools) {
        lines.push(...describeTool(tool));
    }
    return lines.join("\n");
}

function describeBackend(backend: BackendConfig): string {
    switch (backend.kind) {
        case "commandline":
            return `commandline: ${[backend.executable, ...backend.baseArgs].join(" ")} (cwd ${backend.cwd})`;
        case "http":
            return `http: ${backend.baseUrl}`;
        case "python-module":
            return `python-module: ${backend.modulePath}${backend.interpreter ? ` via ${backend.interpreter}` : ""}`;
        case "external":
            return `external: handler '${backend.handler}'`;
    }
}

function describeTool(tool: ToolDefinition): string[] {
    const lines = [`  ${ErrorEnhancer.describeSignature(tool)}`];
    if (tool.description) {
        lines.push(`      ${tool.description}`);
    }
    const invocation = tool.invocation;
    switch (invocation.kind) {
        case "commandline":
            lines.push(`      argv: ${invocation.args.join(" ")}`);
            break;
        case "http":
            lines.push(`      ${invocation.method} ${invocation.endpoint}`);
            break;
        case "python-module":
            lines.push(`      calls ${invocation.callable}`);
            break;
        case "external":
            break;
    }
    for (const parameter of tool.parameters) {
        if (parameter.description) {
            lines.push(`      ${parameter.name}: ${parameter.description}`);
        }
    }
    return lines;
}
