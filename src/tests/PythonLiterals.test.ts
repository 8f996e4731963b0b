import type { AstDocument, SyntaxNode } from "../ast/AstBackend.js";
import { AstManager } from "../ast/AstManager.js";
import { DocumentationExtractor, firstParagraph, parseParameterDocs } from "../ast/extraction/DocumentationExtractor.js";
import { extractParameters, unwrapDefinition } from "../ast/extraction/SignatureExtractor.js";
import { annotationType, literalValue, typeOfLiteral, unquote } from "../ast/PythonLiterals.js";
import type { JsonValue } from "../types.js";

const documents: AstDocument[] = [];

async function parse(source: string): Promise<SyntaxNode> {
    const document = await AstManager.getInstance().parseFile("snippet.py", source);
    documents.push(document);
    return document.rootNode;
}

async function evaluate(expression: string): Promise<JsonValue | undefined> {
    const root = await parse(`x = ${expression}\n`);
    const assignment = root.namedChildren[0]?.namedChildren[0];
    const right = assignment?.childForFieldName("right");
    if (!right) {
        throw new Error(`No assignment parsed from ${expression}`);
    }
    return literalValue(right);
}

async function firstStatement(source: string): Promise<SyntaxNode> {
    const root = await parse(source);
    const statement = root.namedChildren.find(child => child.type !== "comment");
    if (!statement) {
        throw new Error("No statement parsed");
    }
    return statement;
}

afterAll(() => {
    for (const document of documents) {
        document.dispose();
    }
});

describe("literalValue", () => {
    it("evaluates scalars", async () => {
        expect(await evaluate("'text'")).toBe("text");
        expect(await evaluate("\"a\" \"b\"")).toBe("ab");
        expect(await evaluate("1_000")).toBe(1000);
        expect(await evaluate("0x1f")).toBe(31);
        expect(await evaluate("2.5")).toBe(2.5);
        expect(await evaluate("-3")).toBe(-3);
        expect(await evaluate("True")).toBe(true);
        expect(await evaluate("None")).toBeNull();
    });

    it("evaluates containers of literals", async () => {
        expect(await evaluate("['json', 'yaml']")).toEqual(["json", "yaml"]);
        expect(await evaluate("(1, 2)")).toEqual([1, 2]);
        expect(await evaluate("{'a': 1, 'b': [True]}")).toEqual({ a: 1, b: [true] });
    });

    it("gives up on anything computed", async () => {
        expect(await evaluate("os.getcwd()")).toBeUndefined();
        expect(await evaluate("[1, limit]")).toBeUndefined();
        expect(await evaluate("-name")).toBeUndefined();
    });
});

describe("unquote", () => {
    it("strips quotes and resolves escapes", () => {
        expect(unquote("'it\\'s'")).toBe("it's");
        expect(unquote("\"\"\"doc\"\"\"")).toBe("doc");
        expect(unquote("r'\\d+'")).toBe("\\d+");
        expect(unquote("'a\\tb'")).toBe("a\tb");
    });
});

describe("annotationType", () => {
    it("maps annotations to parameter types", () => {
        expect(annotationType("int")).toBe("integer");
        expect(annotationType("Optional[float]")).toBe("number");
        expect(annotationType("bool | None")).toBe("boolean");
        expect(annotationType("typing.List[str]")).toBe("array");
        expect(annotationType("Annotated[int, Query()]")).toBe("integer");
        expect(annotationType("'Union[None, str]'")).toBe("string");
    });

    it("falls back to string for unknown or ambiguous annotations", () => {
        expect(annotationType("Path")).toBe("string");
        expect(annotationType("int | str")).toBe("string");
    });

    it("types literal defaults", () => {
        expect(typeOfLiteral(3)).toBe("integer");
        expect(typeOfLiteral(0.5)).toBe("number");
        expect(typeOfLiteral(null)).toBeUndefined();
        expect(typeOfLiteral({ a: 1 })).toBeUndefined();
    });
});

describe("DocumentationExtractor", () => {
    it("reads the summary and Google-style argument docs", async () => {
        const source = [
            "def convert(source, fmt=\"json\"):",
            "    \"\"\"Convert a file.",
            "",
            "    Reads the source and writes it out.",
            "",
            "    Args:",
            "        source: Input path.",
            "        fmt (str): Output format,",
            "            json or yaml.",
            "    \"\"\"",
            "    return source",
            ""
        ].join("\n");
        const definition = await firstStatement(source);
        const documentation = new DocumentationExtractor().extract(definition);

        expect(documentation.summary).toBe("Convert a file.");
        expect([...documentation.parameters]).toEqual([
            ["source", "Input path."],
            ["fmt", "Output format, json or yaml."]
        ]);
    });

    it("falls back to the comment block above a decorated function", async () => {
        const source = [
            "# Shout the text back.",
            "# Loudly.",
            "@tool",
            "def shout(text: str, times: int = 2, *rest, **extra):",
            "    return text.upper()",
            ""
        ].join("\n");
        const decorated = await firstStatement(source);
        const definition = unwrapDefinition(decorated);
        if (!definition) {
            throw new Error("Expected a function definition");
        }

        expect(new DocumentationExtractor().extract(definition, decorated)).toEqual({
            summary: "Shout the text back. Loudly.",
            parameters: new Map()
        });
        expect(extractParameters(definition).map(p => [p.name, p.annotation, p.defaultValue?.text])).toEqual([
            ["text", "str", undefined],
            ["times", "int", "2"]
        ]);
    });
});

describe("docstring helpers", () => {
    it("parses Sphinx-style parameter lines", () => {
        const docstring = "Delete an item.\n\n:param item_id: Identifier of the item.\n:param bool force: Skip checks.\n";
        expect(parameterEntries(docstring)).toEqual([
            ["item_id", "Identifier of the item."],
            ["force", "Skip checks."]
        ]);
    });

    it("stops the summary at a section header", () => {
        expect(firstParagraph("Run the job.\n    Returns:\n        Nothing.")).toBe("Run the job.");
        expect(firstParagraph("   ")).toBeUndefined();
    });
});

function parameterEntries(docstring: string): Array<[string, string]> {
    return [...parseParameterDocs(docstring)];
}
