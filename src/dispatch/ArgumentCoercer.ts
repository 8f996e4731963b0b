import type { CoercedValue, JsonValue, ParameterType } from "../types.js";

export type Coercion =
    | { ok: true; value: CoercedValue }
    | { ok: false; message: string };

const TRUE_WORDS = new Set(["true", "1", "yes", "y", "on"]);
const FALSE_WORDS = new Set(["false", "0", "no", "n", "off"]);
const INTEGER_TEXT = /^[+-]?\d+$/;

type Coercer = (value: unknown) => Coercion;

const COERCERS: Record<ParameterType, Coercer> = {
    string: toStringValue,
    integer: toIntegerValue,
    number: toNumberValue,
    boolean: toBooleanValue,
    array: toArrayValue
};

/**
 * Converts a call-time argument to the declared parameter type. The target
 * type alone picks the conversion; values that do not fit are rejected.
 */
export function coerceValue(value: unknown, type: ParameterType): Coercion {
    return COERCERS[type](value);
}

export function renderScalar(value: JsonValue): string {
    if (value === null) return "";
    if (typeof value === "object") return JSON.stringify(value);
    return String(value);
}

function toStringValue(value: unknown): Coercion {
    if (typeof value === "string") {
        return { ok: true, value };
    }
    if ((typeof value === "number" && Number.isFinite(value)) || typeof value === "boolean") {
        return { ok: true, value: String(value) };
    }
    return mismatch("string", value);
}

function toIntegerValue(value: unknown): Coercion {
    if (typeof value === "number") {
        return Number.isSafeInteger(value) ? { ok: true, value } : mismatch("integer", value);
    }
    if (typeof value === "string") {
        const trimmed = value.trim();
        if (INTEGER_TEXT.test(trimmed)) {
            const parsed = Number.parseInt(trimmed, 10);
            if (Number.isSafeInteger(parsed)) {
                return { ok: true, value: parsed };
            }
        }
    }
    return mismatch("integer", value);
}

function toNumberValue(value: unknown): Coercion {
    if (typeof value === "number") {
        return Number.isFinite(value) ? { ok: true, value } : mismatch("number", value);
    }
    if (typeof value === "string") {
        const trimmed = value.trim();
        const parsed = Number(trimmed);
        if (trimmed.length > 0 && Number.isFinite(parsed)) {
            return { ok: true, value: parsed };
        }
    }
    return mismatch("number", value);
}

function toBooleanValue(value: unknown): Coercion {
    if (typeof value === "boolean") {
        return { ok: true, value };
    }
    if (typeof value === "string") {
        const word = value.trim().toLowerCase();
        if (TRUE_WORDS.has(word)) return { ok: true, value: true };
        if (FALSE_WORDS.has(word)) return { ok: true, value: false };
    }
    if (value === 1 || value === 0) {
        return { ok: true, value: value === 1 };
    }
    return mismatch("boolean", value);
}

function toArrayValue(value: unknown): Coercion {
    if (Array.isArray(value)) {
        const items: JsonValue[] = [];
        for (const item of value) {
            if (!isJsonValue(item)) {
                return { ok: false, message: "Expected array of JSON values" };
            }
            items.push(item);
        }
        return { ok: true, value: items };
    }
    if (typeof value === "string") {
        const trimmed = value.trim();
        if (trimmed.startsWith("[")) {
            let parsed: unknown;
            try {
                parsed = JSON.parse(trimmed);
            } catch {
                return mismatch("array", value);
            }
            return Array.isArray(parsed) ? toArrayValue(parsed) : mismatch("array", value);
        }
        if (trimmed.length === 0) {
            return { ok: true, value: [] };
        }
        return { ok: true, value: trimmed.split(",").map(part => part.trim()) };
    }
    if ((typeof value === "number" && Number.isFinite(value)) || typeof value === "boolean") {
        return { ok: true, value: [value] };
    }
    return mismatch("array", value);
}

export function isJsonValue(value: unknown): value is JsonValue {
    if (value === null || typeof value === "string" || typeof value === "boolean") {
        return true;
    }
    if (typeof value === "number") {
        return Number.isFinite(value);
    }
    if (Array.isArray(value)) {
        return value.every(isJsonValue);
    }
    if (typeof value === "object") {
        return Object.values(value).every(isJsonValue);
    }
    return false;
}

function mismatch(expected: ParameterType, value: unknown): Coercion {
    return { ok: false, message: `Expected ${expected}, got ${describeValue(value)}` };
}

function describeValue(value: unknown): string {
    if (typeof value === "string") {
        const shown = value.length > 40 ? `${value.slice(0, 40)}...` : value;
        return `string "${shown}"`;
    }
    if (Array.isArray(value)) return "array";
    if (value === null) return "null";
    if (typeof value === "object") return "object";
    return `${typeof value} ${String(value)}`;
}
