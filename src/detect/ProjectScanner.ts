import * as fs from "fs";
import * as path from "path";
import { IgnoreRules } from "../config/IgnoreRules.js";
import { DEFAULT_MAX_FILE_BYTES } from "../config/RuntimeSettings.js";
import { DetectionError, describeError } from "../errors/Errors.js";
import { createLogger } from "../utils/StructuredLogger.js";
import type { SourceFile } from "./types.js";

const logger = createLogger("ProjectScanner");

export interface ScanOptions {
    maxFileBytes?: number;
    extensions?: string[];
    extraIgnorePatterns?: string[];
}

/**
 * Collects candidate source files under a root, in sorted relative-path
 * order.
 */
export class ProjectScanner {
    private readonly maxFileBytes: number;
    private readonly extensions: Set<string>;
    private readonly extraIgnorePatterns: string[];

    constructor(options: ScanOptions = {}) {
        this.maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
        this.extensions = new Set(options.extensions ?? [".py"]);
        this.extraIgnorePatterns = options.extraIgnorePatterns ?? [];
    }

    public scan(projectRoot: string): SourceFile[] {
        const rootPath = path.resolve(projectRoot);
        let stat: fs.Stats;
        try {
            stat = fs.statSync(rootPath);
        } catch (error) {
            throw new DetectionError(`Project root is not readable: ${describeError(error)}`, rootPath);
        }
        if (!stat.isDirectory()) {
            throw new DetectionError(`Project root is not a directory: ${rootPath}`, rootPath);
        }
        try {
            fs.readdirSync(rootPath);
        } catch (error) {
            throw new DetectionError(`Project root is not readable: ${describeError(error)}`, rootPath);
        }

        const rules = new IgnoreRules(rootPath, this.extraIgnorePatterns);
        const relPaths: string[] = [];
        const stack = [""];
        while (stack.length > 0) {
            const relDir = stack.pop();
            if (relDir === undefined) break;
            let entries: fs.Dirent[];
            try {
                entries = fs.readdirSync(path.join(rootPath, relDir), { withFileTypes: true });
            } catch (error) {
                logger.warn("Skipping unreadable directory", { dir: relDir, error: describeError(error) });
                continue;
            }
            for (const entry of entries) {
                if (entry.isSymbolicLink()) continue;
                const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;
                if (entry.isDirectory()) {
                    if (!rules.ignores(relPath, true)) {
                        stack.push(relPath);
                    }
                    continue;
                }
                if (!entry.isFile() || !this.extensions.has(path.extname(entry.name).toLowerCase())) continue;
                if (rules.ignores(relPath)) continue;
                relPaths.push(relPath);
            }
        }

        relPaths.sort(comparePaths);
        const files: SourceFile[] = [];
        for (const relPath of relPaths) {
            const absPath = path.join(rootPath, relPath);
            try {
                const size = fs.statSync(absPath).size;
                if (size > this.maxFileBytes) {
                    logger.warn("Skipping file above size ceiling", { file: relPath, size, limit: this.maxFileBytes });
                    continue;
                }
                files.push({ absPath, relPath, content: fs.readFileSync(absPath, "utf-8") });
            } catch (error) {
                logger.warn("Skipping unreadable file", { file: relPath, error: describeError(error) });
            }
        }
        return files;
    }
}

function comparePaths(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
