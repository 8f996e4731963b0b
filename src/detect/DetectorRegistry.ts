import type { RuntimeSettings } from "../config/RuntimeSettings.js";
import { AssistedDetector } from "./AssistedDetector.js";
import { StructuralDetector } from "./StructuralDetector.js";
import type { DetectionStrategy } from "./types.js";

/**
 * Ordered set of detection strategies. The fallback strategy is always
 * listed last.
 */
export class DetectorRegistry {
    private readonly strategies: DetectionStrategy[] = [];

    constructor(private readonly fallback: DetectionStrategy) {}

    public register(strategy: DetectionStrategy): this {
        if (this.get(strategy.name)) {
            throw new Error(`Detection strategy '${strategy.name}' is already registered`);
        }
        this.strategies.push(strategy);
        return this;
    }

    public get(name: string): DetectionStrategy | undefined {
        return this.list().find(strategy => strategy.name === name);
    }

    public list(): DetectionStrategy[] {
        return [...this.strategies, this.fallback];
    }

    public getFallback(): DetectionStrategy {
        return this.fallback;
    }
}

export function createDefaultRegistry(settings: RuntimeSettings, env: NodeJS.ProcessEnv = process.env): DetectorRegistry {
    const structural = new StructuralDetector({
        maxFileBytes: settings.maxFileBytes,
        pythonExecutable: settings.pythonExecutable
    });
    return new DetectorRegistry(structural).register(new AssistedDetector({
        apiKey: env[settings.openAiKeyEnv],
        model: settings.openAiModel,
        base: structural
    }));
}
