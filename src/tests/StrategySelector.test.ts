import { jest } from "@jest/globals";
import type { ConfigDocument } from "../config/ConfigSchema.js";
import { resolveRuntimeSettingsFromEnv } from "../config/RuntimeSettings.js";
import { AssistedDetector, mergeDescriptions } from "../detect/AssistedDetector.js";
import { DetectorRegistry, createDefaultRegistry } from "../detect/DetectorRegistry.js";
import { StrategySelector } from "../detect/StrategySelector.js";
import type { DetectionStrategy } from "../detect/types.js";
import { DetectionError } from "../errors/Errors.js";

function documentNamed(name: string): ConfigDocument {
    return {
        name,
        description: "API for demo",
        backend: { type: "commandline", config: { command: "python3", args: ["cli.py"], cwd: "/projects/demo" } },
        tools: [{
            name: "convert",
            description: "Convert",
            args: ["{source}"],
            parameters: [{ name: "source", type: "string", description: "Source", required: true }]
        }]
    };
}

class FakeStrategy implements DetectionStrategy {
    public calls = 0;

    constructor(
        public readonly name: string,
        private readonly outcome: ConfigDocument | Error,
        private readonly available = true
    ) {}

    public isAvailable(): boolean {
        return this.available;
    }

    public async detect(): Promise<ConfigDocument> {
        this.calls++;
        if (this.outcome instanceof Error) throw this.outcome;
        return this.outcome;
    }
}

describe("DetectorRegistry", () => {
    it("lists registered strategies before the fallback", () => {
        const registry = new DetectorRegistry(new FakeStrategy("structural", documentNamed("s")))
            .register(new FakeStrategy("assisted", documentNamed("a")));
        expect(registry.list().map(strategy => strategy.name)).toEqual(["assisted", "structural"]);
        expect(registry.get("structural")).toBe(registry.getFallback());
    });

    it("refuses duplicate names", () => {
        const registry = new DetectorRegistry(new FakeStrategy("structural", documentNamed("s")));
        expect(() => registry.register(new FakeStrategy("structural", documentNamed("t")))).toThrow(
            "Detection strategy 'structural' is already registered"
        );
    });

    it("only offers the assisted strategy when a key is configured", () => {
        const settings = resolveRuntimeSettingsFromEnv({});
        const withoutKey = new StrategySelector(createDefaultRegistry(settings, {})).select();
        expect(withoutKey.candidates).toEqual(["structural"]);

        const withKey = new StrategySelector(createDefaultRegistry(settings, { OPENAI_API_KEY: "test-key" })).select();
        expect(withKey.candidates).toEqual(["assisted-openai", "structural"]);
    });
});

describe("StrategySelector", () => {
    it("falls back when a strategy fails and records every attempt", async () => {
        const failing = new FakeStrategy("assisted", new Error("quota exceeded"));
        const registry = new DetectorRegistry(new FakeStrategy("structural", documentNamed("fallback"))).register(failing);

        const result = await new StrategySelector(registry).select().detect("/projects/demo");
        expect(result).toEqual({
            configuration: documentNamed("fallback"),
            strategy: "structural",
            attempts: [
                { strategy: "assisted", outcome: "failed", error: "quota exceeded" },
                { strategy: "structural", outcome: "success" }
            ]
        });
    });

    it("moves the preferred strategy to the front", () => {
        const registry = new DetectorRegistry(new FakeStrategy("structural", documentNamed("s")))
            .register(new FakeStrategy("first", documentNamed("f")))
            .register(new FakeStrategy("second", documentNamed("t")));
        expect(new StrategySelector(registry).select({ preferred: "second" }).candidates).toEqual(["second", "first", "structural"]);
        expect(new StrategySelector(registry).select({ preferred: "missing" }).candidates).toEqual(["first", "second", "structural"]);
    });

    it("skips excluded and unavailable strategies but never the fallback", () => {
        const registry = new DetectorRegistry(new FakeStrategy("structural", documentNamed("s")))
            .register(new FakeStrategy("first", documentNamed("f")))
            .register(new FakeStrategy("offline", documentNamed("o"), false));
        const handle = new StrategySelector(registry).select({ exclude: ["first", "structural"] });
        expect(handle.candidates).toEqual(["structural"]);
    });

    it("rethrows the fallback's detection error", async () => {
        const error = new DetectionError("No recognizable surface: nothing here", "/projects/empty");
        const registry = new DetectorRegistry(new FakeStrategy("structural", error));
        await expect(new StrategySelector(registry).select().detect("/projects/empty")).rejects.toBe(error);
    });

    it("wraps other failures in a detection error", async () => {
        const registry = new DetectorRegistry(new FakeStrategy("structural", new Error("parser crashed")));
        await expect(new StrategySelector(registry).select().detect("/projects/demo")).rejects.toThrow(
            "All detection strategies failed: structural: parser crashed"
        );
    });
});

function completion(content: string): Response {
    return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
        status: 200,
        headers: { "content-type": "application/json" }
    });
}

describe("AssistedDetector", () => {
    it("rewrites descriptions but keeps names and templates", async () => {
        const base = new FakeStrategy("structural", documentNamed("demo"));
        const reply = {
            tools: [
                {
                    name: "convert",
                    description: "Convert a data file to another format.",
                    parameters: [{ name: "source", description: "Path of the file to convert." }, { name: "extra", description: "ignored" }]
                },
                { name: "invented", description: "Not a real tool" }
            ]
        };
        const fetchImpl = jest.fn<typeof fetch>(async () => completion(JSON.stringify(reply)));
        const detector = new AssistedDetector({ apiKey: "test-key", model: "test-model", base, fetchImpl });

        const document = await detector.detect("/projects/demo");
        expect(document.tools).toEqual([{
            name: "convert",
            description: "Convert a data file to another format.",
            args: ["{source}"],
            parameters: [{ name: "source", type: "string", description: "Path of the file to convert.", required: true }]
        }]);

        const call = fetchImpl.mock.calls[0];
        const init = call?.[1];
        expect(call?.[0]).toBe("https://api.openai.com/v1/chat/completions");
        expect(init?.headers).toEqual({ "Authorization": "Bearer test-key", "Content-Type": "application/json" });
        const body: unknown = JSON.parse(typeof init?.body === "string" ? init.body : "{}");
        expect(body).toMatchObject({ model: "test-model", temperature: 0 });
    });

    it("is unavailable without a key", async () => {
        const detector = new AssistedDetector({ apiKey: "  ", base: new FakeStrategy("structural", documentNamed("demo")) });
        expect(detector.isAvailable()).toBe(false);
        await expect(detector.detect("/projects/demo")).rejects.toThrow("No OpenAI API key configured");
    });

    it("fails on an error status or a reply of the wrong shape", async () => {
        const base = new FakeStrategy("structural", documentNamed("demo"));
        const rejected = new AssistedDetector({
            apiKey: "test-key",
            base,
            fetchImpl: async () => new Response("rate limited", { status: 429 })
        });
        await expect(rejected.detect("/projects/demo")).rejects.toThrow("OpenAI description request failed: 429 rate limited");

        const malformed = new AssistedDetector({ apiKey: "test-key", base, fetchImpl: async () => completion("not json") });
        await expect(malformed.detect("/projects/demo")).rejects.toThrow("OpenAI reply was not valid JSON");
    });

    it("ignores blank descriptions when merging", () => {
        const merged = mergeDescriptions(documentNamed("demo"), {
            tools: [{ name: "convert", description: "  ", parameters: [{ name: "source", description: "" }] }]
        });
        expect(merged).toEqual(documentNamed("demo"));
    });
});
