#!/usr/bin/env node
import { loadConfigFile } from "../config/ConfigFile.js";
import { parseConfigDocument, toConfiguration } from "../config/ConfigSchema.js";
import { renderSummary } from "../config/ConfigSummary.js";
import { describeError } from "../errors/Errors.js";
import { ConfigValidator } from "../validation/ConfigValidator.js";

function main(): number {
    const configPath = process.argv[2];
    if (!configPath || configPath === "--help" || configPath === "-h") {
        console.log("Usage: surface-mcp-view <config.json>");
        return configPath ? 0 : 2;
    }

    const document = parseConfigDocument(loadConfigFile(configPath));
    const report = new ConfigValidator().validate(document);
    if (!report.isValid) {
        for (const diagnostic of report.diagnostics.filter(d => d.severity === "error")) {
            console.error(`error ${diagnostic.location}: ${diagnostic.message}`);
        }
        return 1;
    }
    console.log(renderSummary(toConfiguration(document)));
    return 0;
}

try {
    process.exitCode = main();
} catch (err) {
    console.error(`Cannot show configuration: ${describeError(err)}`);
    process.exitCode = 1;
}
