#!/usr/bin/env node
import { loadConfigFile } from "../config/ConfigFile.js";
import { describeError } from "../errors/Errors.js";
import { validateConfig } from "../validation/ConfigValidator.js";

function main(): number {
    const configPath = process.argv[2];
    if (!configPath || configPath === "--help" || configPath === "-h") {
        console.log("Usage: surface-mcp-validate <config.json>");
        return configPath ? 0 : 2;
    }

    const report = validateConfig(loadConfigFile(configPath));
    for (const diagnostic of report.diagnostics) {
        console.log(`${diagnostic.severity.padEnd(7)} ${diagnostic.location}: ${diagnostic.message}`);
    }
    const errors = report.diagnostics.filter(d => d.severity === "error").length;
    const warnings = report.diagnostics.length - errors;
    console.log(`${report.isValid ? "valid" : "invalid"} (${errors} error(s), ${warnings} warning(s))`);
    return report.isValid ? 0 : 1;
}

try {
    process.exitCode = main();
} catch (err) {
    console.error(`Validation failed: ${describeError(err)}`);
    process.exitCode = 1;
}
