import * as fs from "fs";
import * as path from "path";
import ignore from "ignore";
import { createLogger } from "../utils/StructuredLogger.js";

const logger = createLogger("IgnoreRules");

type IgnoreMatcher = ReturnType<typeof ignore>;

const IGNORE_FILES = [".gitignore", ".mcpignore"];

export const DEFAULT_IGNORE_PATTERNS = [
    ".git/",
    ".hg/",
    ".svn/",
    "__pycache__/",
    ".venv/",
    "venv/",
    "env/",
    ".tox/",
    ".nox/",
    ".mypy_cache/",
    ".pytest_cache/",
    ".ruff_cache/",
    "build/",
    "dist/",
    "*.egg-info/",
    "site-packages/",
    "node_modules/",
    "tests/",
    "test/",
    "test_*.py",
    "*_test.py",
    "conftest.py",
    "setup.py"
];

// Directories never searched for nested ignore files.
const IGNORE_SCAN_EXCLUDES = new Set([".git", "node_modules", "__pycache__", ".venv", "venv", ".tox"]);

/**
 * Default exclusions plus every `.gitignore`/`.mcpignore` under the root,
 * each nested file scoped to its own directory.
 */
export class IgnoreRules {
    private readonly matcher: IgnoreMatcher;

    constructor(private readonly rootPath: string, extraPatterns: string[] = []) {
        this.matcher = ignore()
            .add(DEFAULT_IGNORE_PATTERNS)
            .add(this.loadIgnorePatterns())
            .add(extraPatterns);
    }

    /** `relPath` is POSIX-style and relative to the root. */
    public ignores(relPath: string, isDirectory = false): boolean {
        if (relPath.length === 0) return false;
        return this.matcher.ignores(isDirectory ? `${relPath}/` : relPath);
    }

    private loadIgnorePatterns(): string[] {
        const patterns: string[] = [];
        for (const absPath of this.collectIgnoreFiles()) {
            try {
                const content = fs.readFileSync(absPath, "utf-8");
                const relDir = path.relative(this.rootPath, path.dirname(absPath)).replace(/\\/g, "/");
                const parsed = content
                    .split(/\r?\n/)
                    .map(line => line.trim())
                    .filter(line => line.length > 0 && !line.startsWith("#"))
                    .map(line => normalizeIgnorePattern(line, relDir));
                patterns.push(...parsed);
            } catch (error) {
                logger.warn("Failed to read ignore file", { file: absPath, error });
            }
        }
        return patterns;
    }

    private collectIgnoreFiles(): string[] {
        const ignoreFiles: string[] = [];
        const stack = [this.rootPath];
        while (stack.length > 0) {
            const current = stack.pop();
            if (current === undefined) break;
            let entries: fs.Dirent[];
            try {
                entries = fs.readdirSync(current, { withFileTypes: true });
            } catch {
                continue;
            }
            for (const entry of entries) {
                if (entry.isSymbolicLink()) {
                    continue;
                }
                const entryPath = path.join(current, entry.name);
                if (entry.isDirectory()) {
                    if (!IGNORE_SCAN_EXCLUDES.has(entry.name)) {
                        stack.push(entryPath);
                    }
                    continue;
                }
                if (IGNORE_FILES.includes(entry.name)) {
                    ignoreFiles.push(entryPath);
                }
            }
        }
        return ignoreFiles.sort();
    }
}

export function normalizeIgnorePattern(pattern: string, relDir: string): string {
    let negation = "";
    let normalized = pattern;
    if (normalized.startsWith("!")) {
        negation = "!";
        normalized = normalized.slice(1);
    }
    if (!relDir) {
        return `${negation}${normalized}`;
    }
    // Unanchored patterns in a nested file match at any depth below it.
    const anchored = normalized.startsWith("/") || normalized.replace(/\/$/, "").includes("/");
    if (normalized.startsWith("/")) {
        normalized = normalized.slice(1);
    }
    return anchored
        ? `${negation}${relDir}/${normalized}`
        : `${negation}${relDir}/**/${normalized}`;
}
