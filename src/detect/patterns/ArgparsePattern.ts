import * as path from "path";
import type { SyntaxNode } from "../../ast/AstBackend.js";
import { annotationType, literalValue, stringValue, typeOfLiteral } from "../../ast/PythonLiterals.js";
import { placeholder } from "../../config/Placeholders.js";
import type { JsonValue, ParameterType } from "../../types.js";
import { ASTTraversal } from "../../utils/ASTTraversal.js";
import { humanize, sanitizeIdentifier } from "../../utils/Identifiers.js";
import type { CommandLineCandidate, ParameterDocument, ParsedModule, PatternResult } from "../types.js";

const SWITCH_ACTIONS = new Set(["store_true", "store_false", "count"]);
const ARRAY_ACTIONS = new Set(["append", "extend"]);
const SKIPPED_ACTIONS = new Set(["help", "version"]);
const GROUP_METHODS = new Set(["add_argument_group", "add_mutually_exclusive_group"]);

interface ArgumentSpec {
    parameter: ParameterDocument;
    tokens: string[];
}

interface ParserState {
    name?: string;
    description?: string;
    arguments: ArgumentSpec[];
    subcommands: ParserState[];
}

type Binding =
    | { kind: "parser"; parser: ParserState }
    | { kind: "subparsers"; parent: ParserState };

/**
 * argparse declarations: one tool per top-level parser, or one per leaf
 * subcommand when subparsers exist.
 */
export class ArgparsePattern {
    public match(module: ParsedModule): PatternResult<CommandLineCandidate> {
        const bindings = new Map<string, Binding>();
        const parsers: ParserState[] = [];
        const claimed = new Set<number>();
        const handlerNames = new Set<string>();

        const claimEnclosing = (node: SyntaxNode) => {
            const owner = ASTTraversal.findParent(node, n => n.type === "function_definition");
            if (owner) claimed.add(owner.startIndex);
        };

        const handleCall = (call: SyntaxNode): Binding | undefined => {
            const callee = ASTTraversal.field(call, "function");
            const dotted = callee ? ASTTraversal.dottedName(callee) : undefined;
            if (!dotted) return undefined;
            const method = dotted[dotted.length - 1];

            if (method === "ArgumentParser" && (dotted.length === 1 || dotted[0] === "argparse")) {
                const parser = this.createParser(call);
                parsers.push(parser);
                claimEnclosing(call);
                return { kind: "parser", parser };
            }
            if (dotted.length < 2) return undefined;

            const owner = bindings.get(dotted.slice(0, -1).join("."));
            if (!owner) return undefined;

            if (owner.kind === "subparsers") {
                if (method !== "add_parser") return undefined;
                const sub = this.createSubcommand(call);
                if (!sub) return undefined;
                owner.parent.subcommands.push(sub);
                return { kind: "parser", parser: sub };
            }

            const parser = owner.parser;
            if (method === "add_argument") {
                const spec = this.readArgument(call);
                if (spec && !parser.arguments.some(existing => existing.parameter.name === spec.parameter.name)) {
                    parser.arguments.push(spec);
                }
                return undefined;
            }
            if (method === "add_subparsers") {
                return { kind: "subparsers", parent: parser };
            }
            if (GROUP_METHODS.has(method)) {
                return owner;
            }
            if (method === "parse_args" || method === "parse_known_args") {
                claimEnclosing(call);
            }
            if (method === "set_defaults") {
                const handler = ASTTraversal.keywordArguments(call).get("func");
                if (handler?.type === "identifier") handlerNames.add(handler.text);
            }
            return undefined;
        };

        ASTTraversal.walk(module.root, node => {
            if (node.type === "assignment") {
                const left = ASTTraversal.field(node, "left");
                const right = ASTTraversal.field(node, "right");
                if (left && right?.type === "call") {
                    const binding = handleCall(right);
                    if (binding) {
                        bindings.set(left.text, binding);
                    }
                    return false;
                }
                return true;
            }
            if (node.type === "call") {
                handleCall(node);
            }
            return true;
        });

        if (parsers.length === 0) {
            return { candidates: [], claimed };
        }

        if (handlerNames.size > 0) {
            ASTTraversal.walk(module.root, node => {
                if (node.type === "function_definition") {
                    const name = ASTTraversal.field(node, "name")?.text;
                    if (name && handlerNames.has(name)) claimed.add(node.startIndex);
                }
            });
        }

        const stem = path.basename(module.file.relPath, path.extname(module.file.relPath));
        const candidates: CommandLineCandidate[] = [];
        for (const parser of parsers) {
            const rootName = sanitizeIdentifier(parser.name ?? stem, "command");
            for (const leaf of this.expand(parser, [], [], [])) {
                const name = leaf.chain.length > 0 ? sanitizeIdentifier(leaf.chain.join("_")) : rootName;
                candidates.push({
                    kind: "commandline",
                    relPath: module.file.relPath,
                    tool: {
                        name,
                        description: leaf.description ?? humanize(name),
                        args: leaf.tokens,
                        parameters: leaf.parameters
                    }
                });
            }
        }
        return { candidates, claimed };
    }

    private expand(
        parser: ParserState,
        tokens: string[],
        parameters: ParameterDocument[],
        chain: string[]
    ): Array<{ chain: string[]; tokens: string[]; parameters: ParameterDocument[]; description?: string }> {
        const ownTokens = [...tokens];
        const ownParameters = [...parameters];
        for (const spec of parser.arguments) {
            if (ownParameters.some(existing => existing.name === spec.parameter.name)) continue;
            ownTokens.push(...spec.tokens);
            ownParameters.push(spec.parameter);
        }

        if (parser.subcommands.length === 0) {
            return [{ chain, tokens: ownTokens, parameters: ownParameters, description: parser.description }];
        }
        return parser.subcommands.flatMap(sub =>
            this.expand(sub, [...ownTokens, sub.name ?? ""], ownParameters, [...chain, sub.name ?? ""]));
    }

    private createParser(call: SyntaxNode): ParserState {
        const keywords = ASTTraversal.keywordArguments(call);
        const prog = keywords.get("prog");
        const description = keywords.get("description");
        const progName = prog ? stringValue(prog) : undefined;
        return {
            name: progName?.replace(/\.py$/, ""),
            description: description ? cleanText(stringValue(description)) : undefined,
            arguments: [],
            subcommands: []
        };
    }

    private createSubcommand(call: SyntaxNode): ParserState | undefined {
        const first = ASTTraversal.positionalArguments(call)[0];
        const name = first ? stringValue(first) : undefined;
        if (!name) return undefined;
        const keywords = ASTTraversal.keywordArguments(call);
        const help = keywords.get("help") ?? keywords.get("description");
        return {
            name,
            description: help ? cleanText(stringValue(help)) : undefined,
            arguments: [],
            subcommands: []
        };
    }

    private readArgument(call: SyntaxNode): ArgumentSpec | undefined {
        const names: string[] = [];
        for (const arg of ASTTraversal.positionalArguments(call)) {
            const value = stringValue(arg);
            if (value === undefined) return undefined;
            names.push(value);
        }
        const keywords = ASTTraversal.keywordArguments(call);
        const literal = (key: string): JsonValue | undefined => {
            const node = keywords.get(key);
            return node ? literalValue(node) : undefined;
        };

        const flags = names.filter(name => name.startsWith("-"));
        const positional = names.find(name => !name.startsWith("-"));
        const action = literal("action");
        if (typeof action === "string" && SKIPPED_ACTIONS.has(action)) return undefined;
        if (flags.includes("-h") || flags.includes("--help")) return undefined;
        if (flags.length === 0 && positional === undefined) return undefined;

        const longFlag = flags.find(flag => flag.startsWith("--"));
        const dest = literal("dest");
        const rawName = typeof dest === "string"
            ? dest
            : longFlag
                ? longFlag.replace(/^-+/, "")
                : flags.length > 0
                    ? flags[0].replace(/^-+/, "")
                    : positional ?? "";
        const name = sanitizeIdentifier(rawName.replace(/-/g, "_"), "value");

        const defaultValue = literal("default");
        const nargs = literal("nargs");
        const isSwitch = typeof action === "string" && SWITCH_ACTIONS.has(action);
        const type = this.inferType(keywords.get("type"), action, defaultValue, nargs, isSwitch);

        const required = flags.length === 0
            ? !(nargs === "?" || nargs === "*") && (defaultValue === undefined || defaultValue === null)
            : literal("required") === true;

        const parameter: ParameterDocument = {
            name,
            type,
            description: this.describe(keywords, name, defaultValue),
            required
        };
        if (defaultValue !== undefined && defaultValue !== null) {
            parameter.default = defaultValue;
        }

        const tokens = flags.length === 0
            ? [placeholder(name)]
            : [longFlag ?? flags[0], placeholder(name)];
        return { parameter, tokens };
    }

    private inferType(
        typeNode: SyntaxNode | undefined,
        action: JsonValue | undefined,
        defaultValue: JsonValue | undefined,
        nargs: JsonValue | undefined,
        isSwitch: boolean
    ): ParameterType {
        if (isSwitch) return "boolean";
        if (nargs === "+" || nargs === "*" || (typeof nargs === "number" && nargs > 1)) return "array";
        if (typeof action === "string" && ARRAY_ACTIONS.has(action)) return "array";
        if (typeNode && (typeNode.type === "identifier" || typeNode.type === "attribute")) {
            return annotationType(typeNode.text);
        }
        return typeOfLiteral(defaultValue) ?? "string";
    }

    private describe(keywords: Map<string, SyntaxNode>, name: string, defaultValue: JsonValue | undefined): string {
        const helpNode = keywords.get("help");
        let help = helpNode ? cleanText(stringValue(helpNode)) : undefined;
        if (help !== undefined && defaultValue !== undefined) {
            help = help.replace(/%\(default\)s/g, String(defaultValue));
        }
        const choicesNode = keywords.get("choices");
        const choices = choicesNode ? literalValue(choicesNode) : undefined;
        const base = help && help.length > 0 ? help : humanize(name);
        if (Array.isArray(choices) && choices.length > 0) {
            return `${base} One of: ${choices.map(choice => String(choice)).join(", ")}`;
        }
        return base;
    }
}

function cleanText(value: string | undefined): string | undefined {
    if (value === undefined) return undefined;
    const collapsed = value.replace(/\s+/g, " ").trim();
    return collapsed.length > 0 ? collapsed : undefined;
}
