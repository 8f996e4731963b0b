import type { SyntaxNode } from "../ast/AstBackend.js";

export class ASTTraversal {
    public static findParent(node: SyntaxNode, predicate: (n: SyntaxNode) => boolean): SyntaxNode | undefined {
        let current = node.parent;
        while (current) {
            if (predicate(current)) {
                return current;
            }
            current = current.parent;
        }
        return undefined;
    }

    public static field(node: SyntaxNode, name: string): SyntaxNode | undefined {
        return node.childForFieldName(name) ?? undefined;
    }

    /** Pre-order walk over named nodes; returning false skips a subtree. */
    public static walk(node: SyntaxNode, visit: (n: SyntaxNode) => boolean | void): void {
        const stack: SyntaxNode[] = [node];
        while (stack.length > 0) {
            const current = stack.pop();
            if (!current) break;
            if (visit(current) === false) continue;
            const children = current.namedChildren;
            for (let i = children.length - 1; i >= 0; i--) {
                stack.push(children[i]);
            }
        }
    }

    /**
     * Dotted name of a callee or decorator target: `argparse.ArgumentParser`
     * -> ["argparse", "ArgumentParser"]. Undefined for anything that is not
     * a plain identifier/attribute chain.
     */
    public static dottedName(node: SyntaxNode): string[] | undefined {
        if (node.type === "identifier") {
            return [node.text];
        }
        if (node.type === "attribute") {
            const object = ASTTraversal.field(node, "object");
            const attribute = ASTTraversal.field(node, "attribute");
            if (!object || !attribute) return undefined;
            const head = ASTTraversal.dottedName(object);
            return head ? [...head, attribute.text] : undefined;
        }
        return undefined;
    }

    public static positionalArguments(call: SyntaxNode): SyntaxNode[] {
        const args = ASTTraversal.field(call, "arguments");
        if (!args || args.type !== "argument_list") return [];
        return args.namedChildren.filter(child =>
            child.type !== "keyword_argument" &&
            child.type !== "comment" &&
            child.type !== "list_splat" &&
            child.type !== "dictionary_splat");
    }

    public static keywordArguments(call: SyntaxNode): Map<string, SyntaxNode> {
        const keywords = new Map<string, SyntaxNode>();
        const args = ASTTraversal.field(call, "arguments");
        if (!args || args.type !== "argument_list") return keywords;
        for (const child of args.namedChildren) {
            if (child.type !== "keyword_argument") continue;
            const name = ASTTraversal.field(child, "name");
            const value = ASTTraversal.field(child, "value");
            if (name && value) {
                keywords.set(name.text, value);
            }
        }
        return keywords;
    }

    /** Consecutive `#` comment lines directly above `node`. */
    public static precedingComments(node: SyntaxNode): string[] {
        const lines: string[] = [];
        let expectedRow = node.startPosition.row - 1;
        let current = node.previousSibling;
        while (current && current.type === "comment" && current.endPosition.row === expectedRow) {
            lines.unshift(current.text.replace(/^#+\s?/, "").trimEnd());
            expectedRow = current.startPosition.row - 1;
            current = current.previousSibling;
        }
        return lines;
    }
}
