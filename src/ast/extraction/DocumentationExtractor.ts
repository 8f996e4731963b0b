import type { SyntaxNode } from "../AstBackend.js";
import { stringValue } from "../PythonLiterals.js";
import { ASTTraversal } from "../../utils/ASTTraversal.js";

export interface Documentation {
    /** First paragraph of the docstring, else the comment block above. */
    summary?: string;
    /** Per-parameter descriptions from `Args:` sections or `:param x:` lines. */
    parameters: Map<string, string>;
}

const SECTION_HEADERS = new Set(["args", "arguments", "parameters", "params", "keyword args", "keyword arguments"]);
const GOOGLE_ENTRY = /^\*{0,2}([A-Za-z_][A-Za-z0-9_]*)\s*(?:\([^)]*\))?\s*:\s*(.*)$/;
const SPHINX_PARAM = /^:param\s+(?:[^:]*\s)?([A-Za-z_][A-Za-z0-9_]*)\s*:\s*(.*)$/;

export class DocumentationExtractor {
    /**
     * `definition` is a function_definition; `anchor` is the node whose
     * preceding siblings hold comments (the decorated_definition when there
     * is one).
     */
    public extract(definition: SyntaxNode, anchor: SyntaxNode = definition): Documentation {
        const docstring = this.extractDocstring(definition);
        if (docstring !== undefined) {
            return {
                summary: firstParagraph(docstring),
                parameters: parseParameterDocs(docstring)
            };
        }
        const comments = ASTTraversal.precedingComments(anchor);
        return {
            summary: comments.length > 0 ? firstParagraph(comments.join("\n")) : undefined,
            parameters: new Map()
        };
    }

    public extractDocstring(definition: SyntaxNode): string | undefined {
        const body = ASTTraversal.field(definition, "body");
        const first = body?.namedChildren.find(child => child.type !== "comment");
        if (!first || first.type !== "expression_statement") {
            return undefined;
        }
        const literal = first.namedChildren[0];
        return literal ? stringValue(literal) : undefined;
    }
}

export function dedent(text: string): string[] {
    const lines = text.replace(/\r\n/g, "\n").split("\n");
    // The first line sits right after the opening quotes and carries no indent.
    const rest = lines.slice(1).filter(line => line.trim().length > 0);
    const indent = rest.reduce((min, line) => Math.min(min, line.length - line.trimStart().length), Number.POSITIVE_INFINITY);
    const width = Number.isFinite(indent) ? indent : 0;
    return lines.map((line, index) => (index === 0 ? line.trim() : line.slice(width).trimEnd()));
}

export function firstParagraph(text: string): string | undefined {
    const lines = dedent(text);
    const paragraph: string[] = [];
    for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed.length === 0) {
            if (paragraph.length > 0) break;
            continue;
        }
        if (paragraph.length > 0 && isSectionHeader(trimmed)) break;
        paragraph.push(trimmed);
    }
    const joined = paragraph.join(" ").trim();
    return joined.length > 0 ? joined : undefined;
}

export function parseParameterDocs(docstring: string): Map<string, string> {
    const docs = new Map<string, string>();
    const lines = dedent(docstring);

    let sectionIndent: number | undefined;
    let current: { name: string; indent: number; parts: string[] } | undefined;
    const flush = () => {
        if (current && !docs.has(current.name)) {
            docs.set(current.name, current.parts.join(" ").trim());
        }
        current = undefined;
    };

    for (const line of lines) {
        const trimmed = line.trim();
        const indent = line.length - line.trimStart().length;

        const sphinx = SPHINX_PARAM.exec(trimmed);
        if (sphinx) {
            flush();
            sectionIndent = undefined;
            current = { name: sphinx[1], indent, parts: [sphinx[2]] };
            continue;
        }

        if (sectionIndent === undefined) {
            if (isSectionHeader(trimmed) && SECTION_HEADERS.has(trimmed.slice(0, -1).toLowerCase())) {
                flush();
                sectionIndent = indent;
            } else if (current && trimmed.length > 0 && indent > current.indent) {
                current.parts.push(trimmed);
            } else {
                flush();
            }
            continue;
        }

        if (trimmed.length === 0) {
            continue;
        }
        if (indent <= sectionIndent) {
            flush();
            sectionIndent = undefined;
            if (isSectionHeader(trimmed) && SECTION_HEADERS.has(trimmed.slice(0, -1).toLowerCase())) {
                sectionIndent = indent;
            }
            continue;
        }
        const entry = GOOGLE_ENTRY.exec(trimmed);
        if (entry && (!current || indent <= current.indent)) {
            flush();
            current = { name: entry[1], indent, parts: [entry[2]] };
        } else if (current) {
            current.parts.push(trimmed);
        }
    }
    flush();
    return docs;
}

function isSectionHeader(line: string): boolean {
    return /^[A-Z][A-Za-z ]*:$/.test(line);
}
