import type { ToolDefinition, ToolParameter } from "../types.js";
import { findSimilar } from "../utils/Identifiers.js";

export class ErrorEnhancer {
    /**
     * Enhance "unknown tool" failures with the nearest tool names.
     */
    static enhanceUnknownTool(toolName: string, available: readonly string[]): string {
        const similar = findSimilar(toolName, available);
        if (similar.length > 0) {
            return `Did you mean ${similar.map(name => `'${name}'`).join(" or ")}?`;
        }
        if (available.length === 0) {
            return "This configuration exposes no tools.";
        }
        return `Available tools: ${available.join(", ")}`;
    }

    /**
     * Enhance argument failures with the tool's parameter signature.
     */
    static enhanceArgumentFailure(tool: ToolDefinition): string {
        return `Expected ${ErrorEnhancer.describeSignature(tool)}`;
    }

    static enhanceTimeout(timeoutMs: number): string {
        return `The call did not finish within ${formatDuration(timeoutMs)}; raise backend.config.timeout if it needs longer.`;
    }

    static describeSignature(tool: ToolDefinition): string {
        const rendered = tool.parameters.map(describeParameter);
        return `${tool.name}(${rendered.join(", ")})`;
    }
}

function describeParameter(parameter: ToolParameter): string {
    const base = `${parameter.name}: ${parameter.type}`;
    if (parameter.default !== undefined) {
        return `${base} = ${JSON.stringify(parameter.default)}`;
    }
    return parameter.required ? base : `${base}?`;
}

function formatDuration(ms: number): string {
    if (ms % 1000 === 0) {
        return `${ms / 1000}s`;
    }
    return `${ms}ms`;
}
