import * as path from "path";
import type { AstDocument } from "../ast/AstBackend.js";
import { AstManager } from "../ast/AstManager.js";
import type { BackendDocument, ConfigDocument, ToolDocument } from "../config/ConfigSchema.js";
import { DEFAULT_PYTHON } from "../config/RuntimeSettings.js";
import { DetectionError, describeError } from "../errors/Errors.js";
import type { BackendKind } from "../types.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { ArgparsePattern } from "./patterns/ArgparsePattern.js";
import { CallablePattern } from "./patterns/CallablePattern.js";
import { RoutePattern } from "./patterns/RoutePattern.js";
import { readProjectInfo } from "./ProjectInfo.js";
import { ProjectScanner, ScanOptions } from "./ProjectScanner.js";
import type {
    CallableCandidate,
    CommandLineCandidate,
    DetectionStrategy,
    RouteCandidate,
    ServiceHints
} from "./types.js";

const logger = createLogger("StructuralDetector");

// Kinds in tie-break order.
const KIND_PRIORITY: readonly BackendKind[] = ["commandline", "http", "python-module"];

const FLASK_PORT = 5000;
const DEFAULT_PORT = 8000;

export interface StructuralDetectorOptions extends ScanOptions {
    pythonExecutable?: string;
}

interface Collected {
    commandline: CommandLineCandidate[];
    http: RouteCandidate[];
    callables: CallableCandidate[];
    hints: ServiceHints;
}

/**
 * Static analysis of Python sources. Never imports or runs project code.
 */
export class StructuralDetector implements DetectionStrategy {
    public readonly name = "structural";

    private readonly scanner: ProjectScanner;
    private readonly pythonExecutable: string;
    private readonly argparse = new ArgparsePattern();
    private readonly routes = new RoutePattern();
    private readonly callables = new CallablePattern();

    constructor(options: StructuralDetectorOptions = {}) {
        this.scanner = new ProjectScanner(options);
        this.pythonExecutable = options.pythonExecutable ?? DEFAULT_PYTHON;
    }

    public isAvailable(): boolean {
        return true;
    }

    public async detect(projectRoot: string): Promise<ConfigDocument> {
        const rootPath = path.resolve(projectRoot);
        const files = this.scanner.scan(rootPath);
        if (files.length === 0) {
            throw new DetectionError(`No recognizable surface: no Python sources under ${rootPath}`, rootPath);
        }

        const collected: Collected = { commandline: [], http: [], callables: [], hints: { framework: "unknown" } };
        const astManager = AstManager.getInstance();
        let parsedCount = 0;

        for (const file of files) {
            let document: AstDocument;
            try {
                document = await astManager.parseFile(file.absPath, file.content);
            } catch (error) {
                logger.warn("Failed to parse source file", { file: file.relPath, error: describeError(error) });
                continue;
            }
            parsedCount++;
            try {
                if (document.rootNode.hasError) {
                    logger.warn("Source file has syntax errors; analysing the recoverable parts", { file: file.relPath });
                }
                const module = { file, root: document.rootNode };
                const cli = this.argparse.match(module);
                const routes = this.routes.match(module);
                const claimed = new Set([...cli.claimed, ...routes.claimed]);

                collected.commandline.push(...cli.candidates);
                collected.http.push(...routes.candidates);
                collected.callables.push(...this.callables.match(module, claimed));
                mergeHints(collected.hints, routes.hints);
            } finally {
                document.dispose();
            }
        }

        if (parsedCount === 0) {
            throw new DetectionError(`No recognizable surface: none of ${files.length} source files could be parsed`, rootPath);
        }

        const info = readProjectInfo(rootPath);
        const kind = chooseKind(collected);
        const { backend, tools } = this.assemble(kind, collected, rootPath, files[0].relPath);
        logger.debug("Detection finished", {
            root: rootPath,
            kind,
            commandline: collected.commandline.length,
            http: collected.http.length,
            callables: collected.callables.length
        });

        return {
            name: info.name,
            description: info.description,
            backend,
            tools: dedupeNames(tools)
        };
    }

    private assemble(
        kind: BackendKind,
        collected: Collected,
        rootPath: string,
        firstFile: string
    ): { backend: BackendDocument; tools: ToolDocument[] } {
        switch (kind) {
            case "commandline": {
                const scripts = [...new Set(collected.commandline.map(candidate => candidate.relPath))];
                const single = scripts.length === 1;
                return {
                    backend: {
                        type: "commandline",
                        config: { command: this.pythonExecutable, args: single ? [scripts[0]] : [], cwd: rootPath }
                    },
                    tools: collected.commandline.map(candidate => ({
                        ...candidate.tool,
                        args: single ? candidate.tool.args : [candidate.relPath, ...(candidate.tool.args ?? [])]
                    }))
                };
            }
            case "http": {
                const port = collected.hints.port ?? (collected.hints.framework === "flask" ? FLASK_PORT : DEFAULT_PORT);
                return {
                    backend: { type: "http", config: { base_url: `http://localhost:${port}` } },
                    tools: collected.http.map(candidate => candidate.tool)
                };
            }
            case "python-module":
            case "external": {
                const modulePath = pickModule(collected.callables) ?? firstFile;
                return {
                    backend: { type: "python-module", config: { module: modulePath, cwd: rootPath } },
                    tools: collected.callables.map(candidate => ({
                        ...candidate.tool,
                        function: candidate.relPath === modulePath
                            ? candidate.functionName
                            : `${dottedModule(candidate.relPath)}:${candidate.functionName}`
                    }))
                };
            }
        }
    }
}

function chooseKind(collected: Collected): BackendKind {
    const counts: Record<string, number> = {
        commandline: collected.commandline.length,
        http: collected.http.length,
        "python-module": collected.callables.length
    };
    let best: BackendKind = "python-module";
    let bestCount = 0;
    for (const kind of KIND_PRIORITY) {
        if (counts[kind] > bestCount) {
            best = kind;
            bestCount = counts[kind];
        }
    }
    return best;
}

function mergeHints(target: ServiceHints, source: ServiceHints): void {
    if (target.port === undefined && source.port !== undefined) {
        target.port = source.port;
    }
    if (source.framework === "flask" || (source.framework === "fastapi" && target.framework === "unknown")) {
        target.framework = source.framework;
    }
}

/** File holding the most callables; ties go to the first in path order. */
function pickModule(callables: CallableCandidate[]): string | undefined {
    const counts = new Map<string, number>();
    for (const candidate of callables) {
        counts.set(candidate.relPath, (counts.get(candidate.relPath) ?? 0) + 1);
    }
    let best: string | undefined;
    let bestCount = 0;
    for (const [relPath, count] of counts) {
        if (count > bestCount) {
            best = relPath;
            bestCount = count;
        }
    }
    return best;
}

export function dottedModule(relPath: string): string {
    const withoutExt = relPath.replace(/\.pyw?$/, "");
    const segments = withoutExt.split("/");
    if (segments.length > 1 && segments[segments.length - 1] === "__init__") {
        segments.pop();
    }
    return segments.join(".");
}

/** Second and later tools sharing a name become `name_2`, `name_3`, ... */
export function dedupeNames(tools: ToolDocument[]): ToolDocument[] {
    const taken = new Set(tools.map(tool => tool.name));
    const seen = new Set<string>();
    return tools.map(tool => {
        if (!seen.has(tool.name)) {
            seen.add(tool.name);
            return tool;
        }
        let suffix = 2;
        while (taken.has(`${tool.name}_${suffix}`)) suffix++;
        const name = `${tool.name}_${suffix}`;
        taken.add(name);
        seen.add(name);
        return { ...tool, name };
    });
}
