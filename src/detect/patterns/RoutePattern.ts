import type { SyntaxNode } from "../../ast/AstBackend.js";
import { annotationType, literalValue, stringValue, typeOfLiteral } from "../../ast/PythonLiterals.js";
import { DocumentationExtractor } from "../../ast/extraction/DocumentationExtractor.js";
import {
    FormalParameter,
    decoratorsOf,
    extractParameters,
    functionName,
    unwrapDefinition
} from "../../ast/extraction/SignatureExtractor.js";
import type { HttpMethod, JsonValue, ParameterType } from "../../types.js";
import { HTTP_METHODS } from "../../types.js";
import { ASTTraversal } from "../../utils/ASTTraversal.js";
import { humanize, sanitizeIdentifier } from "../../utils/Identifiers.js";
import type {
    ParameterDocument,
    ParsedModule,
    PatternResult,
    RouteCandidate,
    ServiceHints,
    ToolDocument
} from "../types.js";

const VERB_DECORATORS: Record<string, HttpMethod> = {
    get: "GET",
    post: "POST",
    put: "PUT",
    patch: "PATCH",
    delete: "DELETE"
};
const ROUTE_DECORATORS = new Set(["route", "api_route"]);
const FRAMEWORK_TYPES = new Set([
    "Request",
    "Response",
    "BackgroundTasks",
    "WebSocket",
    "HTTPConnection"
]);
const DEPENDENCY_MARKERS = new Set(["Depends", "Security"]);
const PARAM_MARKERS = new Set(["Query", "Body", "Form", "Header", "Cookie", "Path", "File"]);

const FASTAPI_SEGMENT = /\{([A-Za-z_][A-Za-z0-9_]*)(?::([A-Za-z_]+))?\}/g;
const FLASK_SEGMENT = /<(?:([A-Za-z_]+)(?:\([^)]*\))?:)?([A-Za-z_][A-Za-z0-9_]*)>/g;

const CONVERTER_TYPES: Record<string, ParameterType> = {
    int: "integer",
    float: "number"
};

interface PathParameter {
    name: string;
    type: ParameterType;
}

export interface RouteMatch extends PatternResult<RouteCandidate> {
    hints: ServiceHints;
}

/**
 * Route-registration decorators (`@app.get("/x")`, `@bp.route("/x",
 * methods=[...])`), plus router prefixes and the served port.
 */
export class RoutePattern {
    private readonly docs = new DocumentationExtractor();

    public match(module: ParsedModule): RouteMatch {
        const prefixes = new Map<string, string>();
        const hints: ServiceHints = { framework: "unknown" };
        this.collectServiceFacts(module.root, prefixes, hints);

        const candidates: RouteCandidate[] = [];
        const claimed = new Set<number>();

        ASTTraversal.walk(module.root, node => {
            if (node.type !== "decorated_definition") return true;
            const definition = unwrapDefinition(node);
            const name = definition ? functionName(definition) : undefined;
            if (!definition || !name) return true;

            for (const decorator of decoratorsOf(node)) {
                const route = this.readDecorator(decorator, prefixes);
                if (!route) continue;
                claimed.add(definition.startIndex);

                const multiple = route.methods.length > 1;
                for (const method of route.methods) {
                    const toolName = sanitizeIdentifier(multiple ? `${name}_${method.toLowerCase()}` : name);
                    candidates.push({
                        kind: "http",
                        relPath: module.file.relPath,
                        tool: this.buildTool(toolName, name, definition, node, route.path, method)
                    });
                }
            }
            return true;
        });

        return { candidates, claimed, hints };
    }

    private collectServiceFacts(root: SyntaxNode, prefixes: Map<string, string>, hints: ServiceHints): void {
        const includes: Array<{ target: string; prefix: string; replace: boolean }> = [];

        ASTTraversal.walk(root, node => {
            if (node.type === "assignment") {
                const left = ASTTraversal.field(node, "left");
                const right = ASTTraversal.field(node, "right");
                if (left && right?.type === "call") {
                    this.readConstructor(left.text, right, prefixes, hints);
                }
                return true;
            }
            if (node.type !== "call") return true;

            const callee = ASTTraversal.field(node, "function");
            const dotted = callee ? ASTTraversal.dottedName(callee) : undefined;
            if (!dotted) return true;
            const method = dotted[dotted.length - 1];
            const keywords = ASTTraversal.keywordArguments(node);

            if (method === "run") {
                const port = keywords.get("port");
                const value = port ? literalValue(port) : undefined;
                if (typeof value === "number" && Number.isInteger(value) && hints.port === undefined) {
                    hints.port = value;
                }
            } else if (method === "include_router" || method === "register_blueprint") {
                const target = ASTTraversal.positionalArguments(node)[0];
                const key = method === "include_router" ? "prefix" : "url_prefix";
                const prefixNode = keywords.get(key);
                const prefix = prefixNode ? stringValue(prefixNode) : undefined;
                if (target && prefix !== undefined) {
                    includes.push({ target: target.text, prefix, replace: method === "register_blueprint" });
                }
            }
            return true;
        });

        for (const include of includes) {
            const own = prefixes.get(include.target) ?? "";
            prefixes.set(include.target, include.replace ? include.prefix : joinPaths(include.prefix, own));
        }
    }

    private readConstructor(variable: string, call: SyntaxNode, prefixes: Map<string, string>, hints: ServiceHints): void {
        const callee = ASTTraversal.field(call, "function");
        const dotted = callee ? ASTTraversal.dottedName(callee) : undefined;
        const constructorName = dotted ? dotted[dotted.length - 1] : undefined;
        const keywords = ASTTraversal.keywordArguments(call);

        if (constructorName === "Flask" || constructorName === "Blueprint") {
            hints.framework = "flask";
        } else if ((constructorName === "FastAPI" || constructorName === "APIRouter") && hints.framework !== "flask") {
            hints.framework = "fastapi";
        }

        const prefixKey = constructorName === "APIRouter" ? "prefix" : constructorName === "Blueprint" ? "url_prefix" : undefined;
        const prefixNode = prefixKey ? keywords.get(prefixKey) : undefined;
        const prefix = prefixNode ? stringValue(prefixNode) : undefined;
        if (prefix !== undefined) {
            prefixes.set(variable, prefix);
        }
    }

    private readDecorator(
        decorator: SyntaxNode,
        prefixes: Map<string, string>
    ): { path: string; methods: HttpMethod[] } | undefined {
        if (decorator.type !== "call") return undefined;
        const callee = ASTTraversal.field(decorator, "function");
        const dotted = callee ? ASTTraversal.dottedName(callee) : undefined;
        if (!dotted || dotted.length < 2) return undefined;

        const verb = dotted[dotted.length - 1];
        const owner = dotted.slice(0, -1).join(".");
        const keywords = ASTTraversal.keywordArguments(decorator);
        const pathNode = ASTTraversal.positionalArguments(decorator)[0] ?? keywords.get("path") ?? keywords.get("rule");
        const routePath = pathNode ? stringValue(pathNode) : undefined;
        if (routePath === undefined) return undefined;

        let methods: HttpMethod[];
        const verbMethod = Object.prototype.hasOwnProperty.call(VERB_DECORATORS, verb) ? VERB_DECORATORS[verb] : undefined;
        if (verbMethod) {
            methods = [verbMethod];
        } else if (ROUTE_DECORATORS.has(verb)) {
            const declared = keywords.get("methods");
            const values = declared ? literalValue(declared) : undefined;
            methods = Array.isArray(values) ? normalizeMethods(values) : ["GET"];
            if (methods.length === 0) methods = ["GET"];
        } else {
            return undefined;
        }

        return { path: joinPaths(prefixes.get(owner) ?? "", routePath), methods };
    }

    private buildTool(
        toolName: string,
        name: string,
        definition: SyntaxNode,
        anchor: SyntaxNode,
        routePath: string,
        method: HttpMethod
    ): ToolDocument {
        const documentation = this.docs.extract(definition, anchor);
        const { endpoint, pathParameters } = normalizePath(routePath);
        const describe = (param: string) => documentation.parameters.get(param) || humanize(param);

        const parameters: ParameterDocument[] = pathParameters.map(param => ({
            name: param.name,
            type: param.type,
            description: describe(param.name),
            required: true
        }));
        const pathNames = new Set(pathParameters.map(param => param.name));

        for (const formal of extractParameters(definition)) {
            if (pathNames.has(formal.name) || this.isFrameworkParameter(formal)) continue;
            const query = this.readQueryParameter(formal);
            const parameter: ParameterDocument = {
                name: formal.name,
                type: query.type,
                description: query.description ?? describe(formal.name),
                required: false
            };
            if (query.defaultValue !== undefined && query.defaultValue !== null) {
                parameter.default = query.defaultValue;
            }
            parameters.push(parameter);
        }

        return {
            name: toolName,
            description: documentation.summary ?? humanize(name),
            endpoint,
            method,
            parameters
        };
    }

    private isFrameworkParameter(formal: FormalParameter): boolean {
        if (formal.annotation) {
            const base = formal.annotation.split("[")[0].trim().split(".").pop() ?? "";
            if (FRAMEWORK_TYPES.has(base)) return true;
        }
        const marker = formal.defaultValue ? markerName(formal.defaultValue) : undefined;
        return marker !== undefined && DEPENDENCY_MARKERS.has(marker);
    }

    private readQueryParameter(formal: FormalParameter): {
        type: ParameterType;
        defaultValue?: JsonValue;
        description?: string;
    } {
        let defaultValue: JsonValue | undefined;
        let description: string | undefined;
        const defaultNode = formal.defaultValue;

        if (defaultNode && defaultNode.type === "call" && PARAM_MARKERS.has(markerName(defaultNode) ?? "")) {
            const keywords = ASTTraversal.keywordArguments(defaultNode);
            const wrapped = ASTTraversal.positionalArguments(defaultNode)[0] ?? keywords.get("default");
            defaultValue = wrapped ? literalValue(wrapped) : undefined;
            const describedBy = keywords.get("description");
            description = describedBy ? stringValue(describedBy) : undefined;
        } else if (defaultNode) {
            defaultValue = literalValue(defaultNode);
        }

        const type = formal.annotation
            ? annotationType(formal.annotation)
            : typeOfLiteral(defaultValue) ?? "string";
        return { type, defaultValue, description };
    }
}

function markerName(node: SyntaxNode): string | undefined {
    if (node.type !== "call") return undefined;
    const callee = ASTTraversal.field(node, "function");
    const dotted = callee ? ASTTraversal.dottedName(callee) : undefined;
    return dotted ? dotted[dotted.length - 1] : undefined;
}

function normalizeMethods(values: JsonValue[]): HttpMethod[] {
    const methods: HttpMethod[] = [];
    for (const value of values) {
        if (typeof value !== "string") continue;
        const upper = value.toUpperCase();
        const method = HTTP_METHODS.find(candidate => candidate === upper);
        if (method && !methods.includes(method)) methods.push(method);
    }
    return methods;
}

/**
 * Rewrites `<int:id>` and `{id:path}` segments to `{id}` and reports the
 * parameter each segment declares.
 */
export function normalizePath(routePath: string): { endpoint: string; pathParameters: PathParameter[] } {
    const pathParameters: PathParameter[] = [];
    const record = (name: string, converter: string | undefined) => {
        if (!pathParameters.some(param => param.name === name)) {
            const type = converter !== undefined && Object.prototype.hasOwnProperty.call(CONVERTER_TYPES, converter)
                ? CONVERTER_TYPES[converter]
                : "string";
            pathParameters.push({ name, type });
        }
        return `{${name}}`;
    };
    const endpoint = routePath
        .replace(FLASK_SEGMENT, (_match, converter: string | undefined, name: string) => record(name, converter))
        .replace(FASTAPI_SEGMENT, (_match, name: string, converter: string | undefined) => record(name, converter));
    return { endpoint, pathParameters };
}

export function joinPaths(prefix: string, routePath: string): string {
    if (!prefix) return routePath;
    if (!routePath) return prefix;
    return `${prefix.replace(/\/+$/, "")}/${routePath.replace(/^\/+/, "")}`;
}
