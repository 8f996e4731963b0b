import type { SyntaxNode } from "../AstBackend.js";
import { ASTTraversal } from "../../utils/ASTTraversal.js";

export interface FormalParameter {
    name: string;
    annotation?: string;
    defaultValue?: SyntaxNode;
}

const RECEIVERS = new Set(["self", "cls"]);

/**
 * Named formal parameters of a function_definition. Receivers, `*args`,
 * `**kwargs` and bare separators are left out.
 */
export function extractParameters(definition: SyntaxNode): FormalParameter[] {
    const parameters = ASTTraversal.field(definition, "parameters");
    if (!parameters) return [];

    const result: FormalParameter[] = [];
    for (const child of parameters.namedChildren) {
        const formal = toFormal(child);
        if (formal && !RECEIVERS.has(formal.name)) {
            result.push(formal);
        }
    }
    return result;
}

function toFormal(node: SyntaxNode): FormalParameter | undefined {
    switch (node.type) {
        case "identifier":
            return { name: node.text };
        case "typed_parameter": {
            const target = node.namedChildren[0];
            if (!target || target.type !== "identifier") return undefined;
            return { name: target.text, annotation: ASTTraversal.field(node, "type")?.text };
        }
        case "default_parameter": {
            const name = ASTTraversal.field(node, "name");
            if (!name || name.type !== "identifier") return undefined;
            return { name: name.text, defaultValue: ASTTraversal.field(node, "value") };
        }
        case "typed_default_parameter": {
            const name = ASTTraversal.field(node, "name");
            if (!name || name.type !== "identifier") return undefined;
            return {
                name: name.text,
                annotation: ASTTraversal.field(node, "type")?.text,
                defaultValue: ASTTraversal.field(node, "value")
            };
        }
        default:
            return undefined;
    }
}

export function functionName(definition: SyntaxNode): string | undefined {
    return ASTTraversal.field(definition, "name")?.text;
}

/** The function_definition inside a decorated_definition, or the node itself. */
export function unwrapDefinition(node: SyntaxNode): SyntaxNode | undefined {
    if (node.type === "function_definition") return node;
    if (node.type === "decorated_definition") {
        const inner = ASTTraversal.field(node, "definition");
        return inner?.type === "function_definition" ? inner : undefined;
    }
    return undefined;
}

export function decoratorsOf(node: SyntaxNode): SyntaxNode[] {
    if (node.type !== "decorated_definition") return [];
    return node.namedChildren
        .filter(child => child.type === "decorator")
        .map(decorator => decorator.namedChildren.find(child => child.type !== "comment"))
        .filter((expression): expression is SyntaxNode => expression !== undefined);
}
