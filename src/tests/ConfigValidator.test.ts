import { SchemaError } from "../errors/Errors.js";
import type { Diagnostic } from "../types.js";
import { validateConfig } from "../validation/ConfigValidator.js";

interface ToolFixture {
    name: string;
    args?: string[];
    endpoint?: string;
    method?: string;
    parameters?: Array<{ name: string; type: string; required?: boolean; default?: unknown; description?: string }>;
}

function commandLine(tools: ToolFixture[], config: Record<string, unknown> = { command: "mytool" }): Record<string, unknown> {
    return { name: "demo", backend: { type: "commandline", config }, tools };
}

function errors(diagnostics: Diagnostic[]): Diagnostic[] {
    return diagnostics.filter(d => d.severity === "error");
}

describe("ConfigValidator", () => {
    it("accepts a complete command-line configuration", () => {
        const report = validateConfig(commandLine([{
            name: "run",
            args: ["run", "{target}", "--jobs", "{jobs}"],
            parameters: [
                { name: "target", type: "string" },
                { name: "jobs", type: "integer", default: 2 }
            ]
        }]));
        expect(report).toEqual({ isValid: true, diagnostics: [] });
    });

    it("rejects an unknown backend type", () => {
        const report = validateConfig({ name: "demo", backend: { type: "ftp" }, tools: [] });
        expect(report.isValid).toBe(false);
        expect(report.diagnostics).toEqual([{
            severity: "error",
            location: "backend.type",
            message: "Unknown backend type 'ftp'; expected one of commandline, http, python-module, external"
        }]);
    });

    it("requires an absolute http(s) base URL", () => {
        const report = validateConfig({ name: "demo", backend: { type: "http", config: { base_url: "ftp://x" } }, tools: [] });
        expect(report.diagnostics).toEqual([{
            severity: "error",
            location: "backend.config.base_url",
            message: "'ftp://x' is not an absolute http(s) URL"
        }]);
    });

    it("reports duplicate tool names at the second declaration", () => {
        const report = validateConfig(commandLine([{ name: "run", args: ["a"] }, { name: "run", args: ["b"] }]));
        expect(report.diagnostics).toEqual([{
            severity: "error",
            location: "tools[1].name",
            message: "Duplicate tool name 'run' (first declared at tools[0])"
        }]);
    });

    it("rejects tool names that are not identifiers", () => {
        const report = validateConfig(commandLine([{ name: "run-all", args: [] }]));
        expect(report.diagnostics).toEqual([{
            severity: "error",
            location: "tools[0].name",
            message: "Tool name 'run-all' is not identifier-safe"
        }]);
    });

    it("rejects placeholders that name no parameter", () => {
        const report = validateConfig(commandLine([{ name: "run", args: ["{target}"] }]));
        expect(report.diagnostics).toEqual([{
            severity: "error",
            location: "tools[0].args",
            message: "Placeholder '{target}' does not name a declared parameter"
        }]);
    });

    it("rejects required parameters the template never uses", () => {
        const report = validateConfig(commandLine([{ name: "run", args: [], parameters: [{ name: "target", type: "string" }] }]));
        expect(report.diagnostics).toEqual([{
            severity: "error",
            location: "tools[0].parameters[0]",
            message: "Required parameter 'target' is not referenced by the invocation template"
        }]);
    });

    it("warns about optional parameters a command never receives", () => {
        const report = validateConfig(commandLine([{
            name: "run",
            args: [],
            parameters: [{ name: "verbose", type: "boolean", required: false }]
        }]));
        expect(report).toEqual({
            isValid: true,
            diagnostics: [{
                severity: "warning",
                location: "tools[0].parameters[0]",
                message: "Optional parameter 'verbose' is never passed to the command"
            }]
        });
    });

    it("rejects unsupported HTTP methods", () => {
        const report = validateConfig({
            name: "demo",
            backend: { type: "http", config: { base_url: "http://localhost:8000" } },
            tools: [{ name: "get_item", endpoint: "/items", method: "FETCH" }]
        });
        expect(report.diagnostics).toEqual([{
            severity: "error",
            location: "tools[0].method",
            message: "Unsupported HTTP method 'FETCH'; expected one of GET, POST, PUT, PATCH, DELETE"
        }]);
    });

    it("warns about fields that belong to another backend kind", () => {
        const report = validateConfig(commandLine(
            [{ name: "run", args: [], endpoint: "/x" }],
            { command: "mytool", base_url: "http://localhost" }
        ));
        expect(report).toEqual({
            isValid: true,
            diagnostics: [
                { severity: "warning", location: "backend.config.base_url", message: "Field 'base_url' does not apply to commandline backends" },
                { severity: "warning", location: "tools[0].endpoint", message: "Field 'endpoint' does not apply to commandline tools" }
            ]
        });
    });

    it("warns when a default does not fit its type", () => {
        const report = validateConfig(commandLine([{
            name: "run",
            args: ["{jobs}"],
            parameters: [{ name: "jobs", type: "integer", default: "many" }]
        }]));
        expect(report.diagnostics).toEqual([{
            severity: "warning",
            location: "tools[0].parameters[0].default",
            message: "Default does not fit the declared type: Expected integer, got string \"many\""
        }]);
    });

    it("rejects unknown parameter types and duplicate parameters", () => {
        const report = validateConfig(commandLine([{
            name: "run",
            args: ["{a}"],
            parameters: [{ name: "a", type: "str" }, { name: "a", type: "string" }]
        }]));
        expect(errors(report.diagnostics).map(d => d.location)).toEqual([
            "tools[0].parameters[0].type",
            "tools[0].parameters[1].name"
        ]);
    });

    it("rejects a timeout that is not positive", () => {
        const report = validateConfig(commandLine([], { command: "mytool", timeout: -1 }));
        expect(report.diagnostics).toEqual([{
            severity: "error",
            location: "backend.config.timeout",
            message: "Timeout must be a positive number of seconds"
        }]);
    });

    it("needs the backend's required field", () => {
        expect(validateConfig(commandLine([], {})).diagnostics).toEqual([{
            severity: "error",
            location: "backend.config.command",
            message: "Command-line backend needs a command"
        }]);
        expect(validateConfig({ name: "demo", backend: { type: "python-module" }, tools: [] }).diagnostics).toEqual([{
            severity: "error",
            location: "backend.config.module",
            message: "Module backend needs a module path"
        }]);
    });

    it("yields the same report for the same document", () => {
        const document = commandLine([{ name: "run", args: ["{x}"] }, { name: "run", args: [] }]);
        expect(validateConfig(document)).toEqual(validateConfig(document));
    });

    it("throws a schema error for a document of the wrong shape", () => {
        expect(() => validateConfig({ name: "demo", tools: [] })).toThrow(SchemaError);
        expect(() => validateConfig("not a config")).toThrow(SchemaError);
    });
});
