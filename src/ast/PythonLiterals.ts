import type { SyntaxNode } from "./AstBackend.js";
import type { JsonValue, ParameterType } from "../types.js";

const STRING_PREFIX = /^[rRbBuUfF]{0,2}/;

const SIMPLE_ESCAPES: Record<string, string> = {
    n: "\n",
    t: "\t",
    r: "\r",
    "\\": "\\",
    "'": "'",
    "\"": "\"",
    "0": "\0"
};

/** Text of a string literal (or implicit concatenation) without quotes. */
export function stringValue(node: SyntaxNode): string | undefined {
    if (node.type === "concatenated_string") {
        const parts = node.namedChildren.map(stringValue);
        return parts.every(part => part !== undefined) ? parts.join("") : undefined;
    }
    if (node.type !== "string") {
        return undefined;
    }
    return unquote(node.text);
}

export function unquote(literal: string): string {
    const prefix = STRING_PREFIX.exec(literal)?.[0] ?? "";
    const raw = prefix.toLowerCase().includes("r");
    let body = literal.slice(prefix.length);
    for (const quote of ["\"\"\"", "'''", "\"", "'"]) {
        if (body.length >= quote.length * 2 && body.startsWith(quote) && body.endsWith(quote)) {
            body = body.slice(quote.length, body.length - quote.length);
            break;
        }
    }
    if (raw) {
        return body;
    }
    return body.replace(/\\(.)/gs, (match, char: string) => {
        if (char === "\n") return "";
        return SIMPLE_ESCAPES[char] ?? match;
    });
}

/**
 * Evaluates a constant expression. Undefined means "not a literal", which
 * is distinct from Python's None (null).
 */
export function literalValue(node: SyntaxNode): JsonValue | undefined {
    switch (node.type) {
        case "string":
        case "concatenated_string":
            return stringValue(node);
        case "integer":
            return parseIntegerText(node.text);
        case "float": {
            const parsed = Number(node.text.replace(/_/g, ""));
            return Number.isFinite(parsed) ? parsed : undefined;
        }
        case "true":
            return true;
        case "false":
            return false;
        case "none":
            return null;
        case "unary_operator": {
            const operand = node.childForFieldName("argument");
            const value = operand ? literalValue(operand) : undefined;
            if (typeof value !== "number") return undefined;
            return node.text.trimStart().startsWith("-") ? -value : value;
        }
        case "parenthesized_expression": {
            const inner = node.namedChildren[0];
            return inner ? literalValue(inner) : undefined;
        }
        case "list":
        case "tuple":
        case "set": {
            const items: JsonValue[] = [];
            for (const child of node.namedChildren) {
                if (child.type === "comment") continue;
                const value = literalValue(child);
                if (value === undefined) return undefined;
                items.push(value);
            }
            return items;
        }
        case "dictionary": {
            const result: { [key: string]: JsonValue } = {};
            for (const pair of node.namedChildren) {
                if (pair.type === "comment") continue;
                if (pair.type !== "pair") return undefined;
                const key = pair.childForFieldName("key");
                const value = pair.childForFieldName("value");
                const keyValue = key ? stringValue(key) : undefined;
                const valueValue = value ? literalValue(value) : undefined;
                if (keyValue === undefined || valueValue === undefined) return undefined;
                result[keyValue] = valueValue;
            }
            return result;
        }
        default:
            return undefined;
    }
}

function parseIntegerText(text: string): number | undefined {
    const cleaned = text.replace(/_/g, "").toLowerCase().replace(/l$/, "");
    let parsed: number;
    if (/^0x[0-9a-f]+$/.test(cleaned)) {
        parsed = Number.parseInt(cleaned.slice(2), 16);
    } else if (/^0o[0-7]+$/.test(cleaned)) {
        parsed = Number.parseInt(cleaned.slice(2), 8);
    } else if (/^0b[01]+$/.test(cleaned)) {
        parsed = Number.parseInt(cleaned.slice(2), 2);
    } else if (/^\d+$/.test(cleaned)) {
        parsed = Number.parseInt(cleaned, 10);
    } else {
        return undefined;
    }
    return Number.isSafeInteger(parsed) ? parsed : undefined;
}

export function typeOfLiteral(value: JsonValue | undefined): ParameterType | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value === "string") return "string";
    if (typeof value === "boolean") return "boolean";
    if (typeof value === "number") return Number.isInteger(value) ? "integer" : "number";
    if (Array.isArray(value)) return "array";
    return undefined;
}

const TYPE_NAMES: Record<string, ParameterType> = {
    str: "string",
    int: "integer",
    float: "number",
    Decimal: "number",
    bool: "boolean",
    list: "array",
    List: "array",
    tuple: "array",
    Tuple: "array",
    set: "array",
    Set: "array",
    frozenset: "array",
    FrozenSet: "array",
    Sequence: "array",
    Iterable: "array"
};

const WRAPPERS = new Set(["Optional", "Annotated", "Required", "NotRequired"]);

/** Maps annotation source text to a parameter type; unknown -> string. */
export function annotationType(annotation: string): ParameterType {
    return resolveAnnotation(annotation.trim()) ?? "string";
}

function resolveAnnotation(text: string): ParameterType | undefined {
    let current = text.trim();
    if (/^(['"]).*\1$/s.test(current)) {
        current = current.slice(1, -1).trim();
    }

    const unionParts = splitTopLevel(current, "|");
    if (unionParts.length > 1) {
        return resolveUnion(unionParts);
    }

    const bracket = current.indexOf("[");
    const base = lastSegment(bracket >= 0 ? current.slice(0, bracket) : current);
    const inner = bracket >= 0 && current.endsWith("]") ? current.slice(bracket + 1, -1) : undefined;

    if (inner !== undefined && WRAPPERS.has(base)) {
        return resolveAnnotation(splitTopLevel(inner, ",")[0] ?? "");
    }
    if (inner !== undefined && base === "Union") {
        return resolveUnion(splitTopLevel(inner, ","));
    }
    return Object.prototype.hasOwnProperty.call(TYPE_NAMES, base) ? TYPE_NAMES[base] : undefined;
}

function resolveUnion(parts: string[]): ParameterType | undefined {
    const meaningful = parts.map(part => part.trim()).filter(part => part !== "None" && part.length > 0);
    if (meaningful.length !== 1) {
        return undefined;
    }
    return resolveAnnotation(meaningful[0]);
}

function lastSegment(dotted: string): string {
    const segments = dotted.trim().split(".");
    return segments[segments.length - 1] ?? "";
}

function splitTopLevel(text: string, delimiter: string): string[] {
    const parts: string[] = [];
    let depth = 0;
    let start = 0;
    for (let i = 0; i < text.length; i++) {
        const char = text[i];
        if (char === "[" || char === "(") depth++;
        else if (char === "]" || char === ")") depth--;
        else if (char === delimiter && depth === 0) {
            parts.push(text.slice(start, i));
            start = i + 1;
        }
    }
    parts.push(text.slice(start));
    return parts.map(part => part.trim());
}
