import { extractPlaceholders, substitutePlaceholders } from "../../config/Placeholders.js";
import { describeError } from "../../errors/Errors.js";
import type { CoercedValue, HttpBackend, HttpMethod, InvocationResult } from "../../types.js";
import { renderScalar } from "../ArgumentCoercer.js";
import { InvocationContext, failure, success } from "../InvocationContext.js";
import { MAX_CAPTURE_BYTES } from "../ProcessRunner.js";

const QUERY_METHODS = new Set<HttpMethod>(["GET", "DELETE"]);

export interface HttpRequestPlan {
    url: string;
    method: HttpMethod;
    headers: Record<string, string>;
    body?: string;
}

/**
 * Path placeholders are URI-encoded into the endpoint; remaining values go
 * to the query string (GET, DELETE) or a JSON body.
 */
export function planRequest(
    backend: HttpBackend,
    endpoint: string,
    method: HttpMethod,
    values: Readonly<Record<string, CoercedValue>>
): HttpRequestPlan {
    const pathNames = new Set(extractPlaceholders(endpoint));
    const renderedPath = substitutePlaceholders(endpoint, name => encodeURIComponent(renderPathValue(values[name])));
    const url = new URL(joinUrl(backend.baseUrl, renderedPath));

    const remaining: Array<[string, CoercedValue]> = Object.entries(values).filter(([name]) => !pathNames.has(name));
    const headers: Record<string, string> = { Accept: "application/json, text/plain;q=0.9, */*;q=0.8" };
    let body: string | undefined;

    if (QUERY_METHODS.has(method)) {
        for (const [name, value] of remaining) {
            const items = Array.isArray(value) ? value.map(renderScalar) : [String(value)];
            for (const item of items) {
                url.searchParams.append(name, item);
            }
        }
    } else if (remaining.length > 0) {
        body = JSON.stringify(Object.fromEntries(remaining));
        headers["Content-Type"] = "application/json";
    }

    return { url: url.toString(), method, headers: { ...headers, ...(backend.headers ?? {}) }, body };
}

function renderPathValue(value: CoercedValue | undefined): string {
    if (value === undefined) return "";
    if (Array.isArray(value)) return value.map(renderScalar).join(",");
    return String(value);
}

function joinUrl(baseUrl: string, endpoint: string): string {
    if (!endpoint) return baseUrl;
    return `${baseUrl.replace(/\/+$/, "")}/${endpoint.replace(/^\/+/, "")}`;
}

export class HttpInvoker {
    constructor(private readonly fetchImpl: typeof fetch = fetch) {}

    public async invoke(
        backend: HttpBackend,
        endpoint: string,
        method: HttpMethod,
        context: InvocationContext
    ): Promise<InvocationResult> {
        let plan: HttpRequestPlan;
        try {
            plan = planRequest(backend, endpoint, method, context.arguments);
        } catch (error) {
            return failure("RuntimeError", `Could not build request URL: ${describeError(error)}`);
        }

        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, context.timeoutMs);
        const onAbort = () => controller.abort();
        if (context.signal?.aborted) {
            controller.abort();
        } else {
            context.signal?.addEventListener("abort", onAbort, { once: true });
        }

        try {
            const response = await this.fetchImpl(plan.url, {
                method: plan.method,
                headers: plan.headers,
                body: plan.body,
                signal: controller.signal
            });
            const text = await response.text();
            const bodyText = text.length > MAX_CAPTURE_BYTES ? text.slice(0, MAX_CAPTURE_BYTES) : text;
            const decoded = decodeBody(bodyText, response.headers.get("content-type"));

            if (response.ok) {
                return success(decoded);
            }
            return failure("BackendError", `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`, {
                status: response.status,
                body: decoded,
                url: plan.url
            });
        } catch (error) {
            if (timedOut) {
                return failure("Timeout", `Request to ${plan.url} did not finish within ${context.timeoutMs}ms and was aborted`);
            }
            if (controller.signal.aborted) {
                return failure("Cancelled", `Request to ${plan.url} was cancelled by the caller`);
            }
            return failure("RuntimeError", `Request to ${plan.url} failed: ${describeFetchError(error)}`, { url: plan.url });
        } finally {
            clearTimeout(timer);
            context.signal?.removeEventListener("abort", onAbort);
        }
    }
}

function decodeBody(text: string, contentType: string | null): unknown {
    if (contentType && /[/+]json\b/i.test(contentType) && text.length > 0) {
        try {
            return JSON.parse(text);
        } catch {
            return text;
        }
    }
    return text;
}

export function describeFetchError(error: unknown): string {
    const cause = typeof error === "object" && error !== null && "cause" in error ? error.cause : undefined;
    if (cause !== undefined && cause !== null) {
        return `${describeError(error)} (${describeError(cause)})`;
    }
    return describeError(error);
}
