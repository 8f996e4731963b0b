import * as path from "path";
import { AstBackend, AstDocument } from "./AstBackend.js";
import { EXT_TO_LANG, WebTreeSitterBackend } from "./WebTreeSitterBackend.js";
import { resolveRuntimeSettingsFromEnv } from "../config/RuntimeSettings.js";

export class AstManager {
    private static instance: AstManager | undefined;
    private initialized = false;
    private backend: AstBackend;

    private constructor() {
        this.backend = AstManager.createDefaultBackend();
    }

    public static getInstance(): AstManager {
        if (!AstManager.instance) {
            AstManager.instance = new AstManager();
        }
        return AstManager.instance;
    }

    public static resetForTesting(): void {
        AstManager.instance = undefined;
    }

    private static createDefaultBackend(): AstBackend {
        return new WebTreeSitterBackend({ wasmDir: resolveRuntimeSettingsFromEnv().wasmDir });
    }

    public async init(): Promise<void> {
        if (this.initialized) {
            return;
        }
        try {
            await this.backend.initialize();
            this.initialized = true;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to initialize AST backend ${this.backend.name}: ${message}`);
        }
    }

    public async parseFile(filePath: string, content: string): Promise<AstDocument> {
        if (!this.initialized) await this.init();
        return this.backend.parseFile(filePath, content, this.getLanguageId(filePath));
    }

    public supportsFile(filePath: string): boolean {
        return EXT_TO_LANG[path.extname(filePath).toLowerCase()] !== undefined;
    }

    public getLanguageId(filePath: string): string {
        const langName = EXT_TO_LANG[path.extname(filePath).toLowerCase()];
        if (!langName) {
            throw new Error(`Unsupported language for ${filePath}`);
        }
        return langName;
    }
}
