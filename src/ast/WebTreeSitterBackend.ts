import * as path from "path";
import Parser from "web-tree-sitter";
import { AstBackend, AstDocument } from "./AstBackend.js";
import { createLogger } from "../utils/StructuredLogger.js";

const logger = createLogger("WebTreeSitter");

export const EXT_TO_LANG: Record<string, string> = {
    ".py": "python",
    ".pyw": "python"
};

export interface WebTreeSitterOptions {
    /** Directory holding `tree-sitter-<language>.wasm` grammars. */
    wasmDir?: string;
}

export class WebTreeSitterBackend implements AstBackend {
    name = "web-tree-sitter";

    private initialized = false;
    private readonly languages = new Map<string, Parser.Language>();
    private readonly parsers = new Map<string, Parser>();

    constructor(private readonly options: WebTreeSitterOptions = {}) {}

    async initialize(): Promise<void> {
        if (this.initialized) return;
        try {
            await Parser.init();
            this.initialized = true;
        } catch (error) {
            logger.error("Failed to initialize web-tree-sitter", { error });
            throw error;
        }
    }

    async parseFile(absPath: string, content: string, languageHint?: string): Promise<AstDocument> {
        if (!this.initialized) await this.initialize();

        const langName = languageHint ?? EXT_TO_LANG[path.extname(absPath).toLowerCase()];
        if (!langName) {
            throw new Error(`Unsupported language for file: ${absPath}`);
        }

        const parser = await this.getParserForLanguage(langName);
        const tree = parser.parse(content);

        return {
            rootNode: tree.rootNode,
            languageId: langName,
            dispose: () => tree.delete()
        };
    }

    async getLanguage(languageId: string): Promise<Parser.Language> {
        if (!this.initialized) await this.initialize();

        const cached = this.languages.get(languageId);
        if (cached) {
            return cached;
        }

        const wasmPath = this.getWasmPath(languageId);
        try {
            const lang = await Parser.Language.load(wasmPath);
            this.languages.set(languageId, lang);
            return lang;
        } catch (error) {
            logger.error("Failed to load grammar", { languageId, wasmPath, error });
            throw error;
        }
    }

    private async getParserForLanguage(langName: string): Promise<Parser> {
        const cached = this.parsers.get(langName);
        if (cached) {
            return cached;
        }

        const lang = await this.getLanguage(langName);
        const parser = new Parser();
        parser.setLanguage(lang);
        this.parsers.set(langName, parser);
        return parser;
    }

    private getWasmPath(langName: string): string {
        const overrideDir = (this.options.wasmDir ?? "").trim();
        if (overrideDir) {
            return path.resolve(overrideDir, `tree-sitter-${langName}.wasm`);
        }

        try {
            return require.resolve(`tree-sitter-wasms/out/tree-sitter-${langName}.wasm`);
        } catch {
            return path.resolve(process.cwd(), `node_modules/tree-sitter-wasms/out/tree-sitter-${langName}.wasm`);
        }
    }

    public dispose(): void {
        for (const parser of this.parsers.values()) {
            parser.delete();
        }
        this.parsers.clear();
        this.languages.clear();
    }
}
