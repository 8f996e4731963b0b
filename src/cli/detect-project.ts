#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import { resolveRuntimeSettingsFromEnv } from "../config/RuntimeSettings.js";
import { createDefaultRegistry } from "../detect/DetectorRegistry.js";
import { StrategySelector } from "../detect/StrategySelector.js";
import { describeError } from "../errors/Errors.js";
import { ConfigValidator } from "../validation/ConfigValidator.js";

interface DetectArgs {
    help: boolean;
    projectRoot?: string;
    out?: string;
    strategy?: string;
    exclude: string[];
}

function parseArgs(argv: string[]): DetectArgs {
    const args: DetectArgs = { help: false, exclude: [] };
    for (let i = 0; i < argv.length; i += 1) {
        const a = argv[i];
        if (a === "--help" || a === "-h") args.help = true;
        else if (a === "--out" || a === "-o") args.out = argv[++i];
        else if (a === "--strategy") args.strategy = argv[++i];
        else if (a === "--exclude") args.exclude.push(argv[++i] ?? "");
        else if (!args.projectRoot) args.projectRoot = a;
    }
    return args;
}

function usage(): string {
    return [
        "Usage: surface-mcp-detect <project-dir> [--out config.json] [--strategy name] [--exclude name]",
        "",
        "Notes:",
        "- Strategies: structural (always available), assisted-openai (needs an API key).",
        "- Without --out the configuration is printed to stdout."
    ].join("\n");
}

async function main() {
    const args = parseArgs(process.argv.slice(2));
    if (args.help || !args.projectRoot) {
        console.log(usage());
        if (!args.help) process.exitCode = 2;
        return;
    }

    const settings = resolveRuntimeSettingsFromEnv();
    const selector = new StrategySelector(createDefaultRegistry(settings));
    const handle = selector.select({
        preferred: args.strategy ?? settings.preferredDetector,
        exclude: args.exclude
    });
    const result = await handle.detect(args.projectRoot);
    const report = new ConfigValidator().validate(result.configuration);
    const json = `${JSON.stringify(result.configuration, null, 2)}\n`;

    if (args.out) {
        fs.writeFileSync(path.resolve(args.out), json, "utf-8");
    } else {
        process.stdout.write(json);
    }

    console.error(`Detected ${result.configuration.tools.length} tool(s) with ${result.strategy} (${result.configuration.backend.type} backend)`);
    for (const diagnostic of report.diagnostics) {
        console.error(`  ${diagnostic.severity}: ${diagnostic.location}: ${diagnostic.message}`);
    }
}

main().catch((err: unknown) => {
    console.error(`Detection failed: ${describeError(err)}`);
    process.exitCode = 1;
});
