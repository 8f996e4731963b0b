import { z } from "zod";
import type { ConfigDocument, ToolDocument } from "../config/ConfigSchema.js";
import { DEFAULT_OPENAI_MODEL } from "../config/RuntimeSettings.js";
import { createLogger } from "../utils/StructuredLogger.js";
import type { DetectionStrategy } from "./types.js";

const logger = createLogger("AssistedDetector");

const CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

const SYSTEM_PROMPT = [
    "You write concise, accurate descriptions for tools that an assistant can call.",
    "You receive a project summary and its tools as JSON.",
    "Reply with JSON only, shaped as {\"tools\":[{\"name\":\"...\",\"description\":\"...\",\"parameters\":[{\"name\":\"...\",\"description\":\"...\"}]}]}.",
    "Keep every tool and parameter name exactly as given; change descriptions only."
].join(" ");

const completionSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullable() })
    })).min(1)
});

const enhancementSchema = z.object({
    tools: z.array(z.object({
        name: z.string(),
        description: z.string().optional(),
        parameters: z.array(z.object({
            name: z.string(),
            description: z.string().optional()
        })).optional()
    }))
});

export type Enhancement = z.infer<typeof enhancementSchema>;

export interface AssistedDetectorOptions {
    apiKey?: string;
    model?: string;
    /** Strategy producing the configuration whose descriptions get rewritten. */
    base: DetectionStrategy;
    timeoutMs?: number;
    fetchImpl?: typeof fetch;
}

/**
 * Runs the base strategy, then asks a chat-completions model to rewrite
 * descriptions. Names, types and templates are never taken from the model.
 */
export class AssistedDetector implements DetectionStrategy {
    public readonly name = "assisted-openai";

    private readonly apiKey?: string;
    private readonly model: string;
    private readonly base: DetectionStrategy;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: AssistedDetectorOptions) {
        this.apiKey = options.apiKey?.trim() || undefined;
        this.model = options.model ?? DEFAULT_OPENAI_MODEL;
        this.base = options.base;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    public isAvailable(): boolean {
        return this.apiKey !== undefined;
    }

    public async detect(projectRoot: string): Promise<ConfigDocument> {
        const apiKey = this.apiKey;
        if (!apiKey) {
            throw new Error("No OpenAI API key configured");
        }
        const document = await this.base.detect(projectRoot);
        if (document.tools.length === 0) {
            return document;
        }
        const enhancement = await this.requestEnhancement(apiKey, document);
        logger.debug("Applied description enhancement", { tools: enhancement.tools.length });
        return mergeDescriptions(document, enhancement);
    }

    private async requestEnhancement(apiKey: string, document: ConfigDocument): Promise<Enhancement> {
        const summary = {
            project: document.name,
            description: document.description,
            tools: document.tools.map(tool => ({
                name: tool.name,
                description: tool.description,
                parameters: (tool.parameters ?? []).map(parameter => ({
                    name: parameter.name,
                    type: parameter.type,
                    description: parameter.description
                }))
            }))
        };

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);
        let response: Response;
        try {
            response = await this.fetchImpl(CHAT_COMPLETIONS_URL, {
                method: "POST",
                headers: {
                    "Authorization": `Bearer ${apiKey}`,
                    "Content-Type": "application/json"
                },
                body: JSON.stringify({
                    model: this.model,
                    temperature: 0,
                    response_format: { type: "json_object" },
                    messages: [
                        { role: "system", content: SYSTEM_PROMPT },
                        { role: "user", content: JSON.stringify(summary) }
                    ]
                }),
                signal: controller.signal
            });
        } finally {
            clearTimeout(timer);
        }

        if (!response.ok) {
            const message = await response.text();
            throw new Error(`OpenAI description request failed: ${response.status} ${message}`);
        }

        const completion = completionSchema.safeParse(await response.json());
        if (!completion.success) {
            throw new Error("OpenAI response did not contain a chat completion");
        }
        const content = completion.data.choices[0].message.content ?? "";
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch {
            throw new Error("OpenAI reply was not valid JSON");
        }
        const enhancement = enhancementSchema.safeParse(parsed);
        if (!enhancement.success) {
            throw new Error("OpenAI reply did not match the expected tool description shape");
        }
        return enhancement.data;
    }
}

export function mergeDescriptions(document: ConfigDocument, enhancement: Enhancement): ConfigDocument {
    const byName = new Map(enhancement.tools.map(tool => [tool.name, tool]));
    const tools: ToolDocument[] = document.tools.map(tool => {
        const update = byName.get(tool.name);
        if (!update) return tool;
        const parameterUpdates = new Map((update.parameters ?? []).map(p => [p.name, p.description]));
        return {
            ...tool,
            description: nonEmpty(update.description) ?? tool.description,
            parameters: tool.parameters?.map(parameter => ({
                ...parameter,
                description: nonEmpty(parameterUpdates.get(parameter.name)) ?? parameter.description
            }))
        };
    });
    return { ...document, tools };
}

function nonEmpty(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}
