import { DetectionError, describeError } from "../errors/Errors.js";
import { createLogger } from "../utils/StructuredLogger.js";
import type { DetectorRegistry } from "./DetectorRegistry.js";
import type { DetectionAttempt, DetectionResult, DetectionStrategy } from "./types.js";

const logger = createLogger("StrategySelector");

export interface SelectionPreferences {
    /** Moved to the front when available. */
    preferred?: string;
    /** Skipped entirely; the fallback strategy cannot be excluded. */
    exclude?: string[];
}

export interface DetectorHandle {
    /** Names of the strategies that will be tried, in order. */
    readonly candidates: string[];
    detect(projectRoot: string): Promise<DetectionResult>;
}

export class StrategySelector {
    constructor(private readonly registry: DetectorRegistry) {}

    public select(preferences: SelectionPreferences = {}): DetectorHandle {
        const ordered = this.order(preferences);
        return {
            candidates: ordered.map(strategy => strategy.name),
            detect: projectRoot => runWithFallback(ordered, projectRoot)
        };
    }

    private order(preferences: SelectionPreferences): DetectionStrategy[] {
        const excluded = new Set(preferences.exclude ?? []);
        const fallback = this.registry.getFallback();
        const available = this.registry.list().filter(strategy =>
            strategy === fallback || (!excluded.has(strategy.name) && strategy.isAvailable()));

        const preferred = preferences.preferred;
        if (!preferred) {
            return available;
        }
        const match = available.find(strategy => strategy.name === preferred);
        if (!match) {
            logger.warn("Preferred detection strategy is not available", {
                preferred,
                available: available.map(strategy => strategy.name)
            });
            return available;
        }
        return [match, ...available.filter(strategy => strategy !== match)];
    }
}

async function runWithFallback(strategies: DetectionStrategy[], projectRoot: string): Promise<DetectionResult> {
    const attempts: DetectionAttempt[] = [];
    let lastError: unknown;

    for (const strategy of strategies) {
        try {
            const configuration = await strategy.detect(projectRoot);
            attempts.push({ strategy: strategy.name, outcome: "success" });
            return { configuration, strategy: strategy.name, attempts };
        } catch (error) {
            lastError = error;
            attempts.push({ strategy: strategy.name, outcome: "failed", error: describeError(error) });
            logger.warn("Detection strategy failed; falling back", { strategy: strategy.name, error: describeError(error) });
        }
    }

    if (lastError instanceof DetectionError) {
        throw lastError;
    }
    throw new DetectionError(
        `All detection strategies failed: ${attempts.map(a => `${a.strategy}: ${a.error ?? "unknown"}`).join("; ")}`,
        projectRoot
    );
}
