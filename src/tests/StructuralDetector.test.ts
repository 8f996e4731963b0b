import fs from "fs";
import os from "os";
import path from "path";
import { StructuralDetector, dedupeNames, dottedModule } from "../detect/StructuralDetector.js";
import { DetectionError } from "../errors/Errors.js";
import { validateConfig } from "../validation/ConfigValidator.js";

const CLI_SOURCE = `import argparse


def main():
    parser = argparse.ArgumentParser(prog="convert", description="Convert data files.")
    parser.add_argument("source", help="Input file")
    parser.add_argument("--format", default="json", choices=["json", "yaml"], help="Output format (default: %(default)s).")
    parser.add_argument("-n", "--count", type=int, default=1)
    parser.add_argument("-v", "--verbose", action="store_true")
    parser.add_argument("--version", action="version", version="1.0")
    args = parser.parse_args()
    print(args)


if __name__ == "__main__":
    main()
`;

const SUBCOMMAND_SOURCE = `import argparse

parser = argparse.ArgumentParser(description="Manage notes.")
parser.add_argument("--db", default="notes.db", help="Database file")
sub = parser.add_subparsers(dest="command")

add = sub.add_parser("add", help="Add a note")
add.add_argument("text", help="Note text")

remove = sub.add_parser("remove", help="Remove a note")
remove.add_argument("id", type=int, help="Note id")

args = parser.parse_args()
`;

const FLASK_SOURCE = `from flask import Flask

app = Flask(__name__)


@app.route("/items/<int:item_id>", methods=["GET", "DELETE"])
def item(item_id):
    """Fetch or delete an item.

    Args:
        item_id: Item id
    """
    return {"id": item_id}


@app.get("/search")
def search(q: str = "", limit: int = 10):
    """Search items.

    :param q: Text to look for.
    """
    return []


if __name__ == "__main__":
    app.run(port=5050)
`;

const FASTAPI_SOURCE = `from fastapi import APIRouter, FastAPI, Query, Request

app = FastAPI()
router = APIRouter(prefix="/users")


@router.get("/{user_id}")
def read_user(user_id, verbose: bool = Query(False, description="Include details")):
    """Read one user."""
    return {}


@router.post("/")
async def create_user(request: Request, name: str):
    return {}


app.include_router(router, prefix="/api")
`;

const TOOLS_SOURCE = `def add(a: int, b: int = 2):
    """Add two numbers."""
    return a + b


# Shout the text back.
def shout(text):
    return text.upper()


def _private():
    pass
`;

const HELPERS_SOURCE = `def slugify(value: str) -> str:
    """Make a URL slug."""
    return value.lower().replace(" ", "-")
`;

describe("StructuralDetector", () => {
    let root: string;
    const detector = new StructuralDetector({ pythonExecutable: "python3" });

    function write(files: Record<string, string>): void {
        for (const [relPath, content] of Object.entries(files)) {
            const absPath = path.join(root, relPath);
            fs.mkdirSync(path.dirname(absPath), { recursive: true });
            fs.writeFileSync(absPath, content);
        }
    }

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), "surface-detect-"));
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it("turns an argparse script into a command-line tool", async () => {
        write({ "cli.py": CLI_SOURCE, "pyproject.toml": "[project]\nname = \"converter\"\n" });
        const document = await detector.detect(root);

        expect(document).toEqual({
            name: "converter",
            description: "API for converter",
            backend: { type: "commandline", config: { command: "python3", args: ["cli.py"], cwd: root } },
            tools: [{
                name: "convert",
                description: "Convert data files.",
                args: ["{source}", "--format", "{format}", "--count", "{count}", "--verbose", "{verbose}"],
                parameters: [
                    { name: "source", type: "string", description: "Input file", required: true },
                    {
                        name: "format",
                        type: "string",
                        description: "Output format (default: json). One of: json, yaml",
                        required: false,
                        default: "json"
                    },
                    { name: "count", type: "integer", description: "Count", required: false, default: 1 },
                    { name: "verbose", type: "boolean", description: "Verbose", required: false }
                ]
            }]
        });
        expect(validateConfig(document)).toEqual({ isValid: true, diagnostics: [] });
    });

    it("emits one tool per subcommand", async () => {
        write({ "notes.py": SUBCOMMAND_SOURCE });
        const document = await detector.detect(root);
        const db = { name: "db", type: "string", description: "Database file", required: false, default: "notes.db" };

        expect(document.tools).toEqual([
            {
                name: "add",
                description: "Add a note",
                args: ["--db", "{db}", "add", "{text}"],
                parameters: [db, { name: "text", type: "string", description: "Note text", required: true }]
            },
            {
                name: "remove",
                description: "Remove a note",
                args: ["--db", "{db}", "remove", "{id}"],
                parameters: [db, { name: "id", type: "integer", description: "Note id", required: true }]
            }
        ]);
    });

    it("turns Flask routes into HTTP tools", async () => {
        write({ "app.py": FLASK_SOURCE });
        const document = await detector.detect(root);
        const itemId = { name: "item_id", type: "integer", description: "Item id", required: true };

        expect(document.backend).toEqual({ type: "http", config: { base_url: "http://localhost:5050" } });
        expect(document.tools).toEqual([
            { name: "item_get", description: "Fetch or delete an item.", endpoint: "/items/{item_id}", method: "GET", parameters: [itemId] },
            { name: "item_delete", description: "Fetch or delete an item.", endpoint: "/items/{item_id}", method: "DELETE", parameters: [itemId] },
            {
                name: "search",
                description: "Search items.",
                endpoint: "/search",
                method: "GET",
                parameters: [
                    { name: "q", type: "string", description: "Text to look for.", required: false, default: "" },
                    { name: "limit", type: "integer", description: "Limit", required: false, default: 10 }
                ]
            }
        ]);
        expect(validateConfig(document).isValid).toBe(true);
    });

    it("applies FastAPI router prefixes and skips framework parameters", async () => {
        write({ "main.py": FASTAPI_SOURCE });
        const document = await detector.detect(root);

        expect(document.backend).toEqual({ type: "http", config: { base_url: "http://localhost:8000" } });
        expect(document.tools).toEqual([
            {
                name: "read_user",
                description: "Read one user.",
                endpoint: "/api/users/{user_id}",
                method: "GET",
                parameters: [
                    { name: "user_id", type: "string", description: "User id", required: true },
                    { name: "verbose", type: "boolean", description: "Include details", required: false, default: false }
                ]
            },
            {
                name: "create_user",
                description: "Create user",
                endpoint: "/api/users/",
                method: "POST",
                parameters: [{ name: "name", type: "string", description: "Name", required: false }]
            }
        ]);
    });

    it("exposes public functions through a module backend", async () => {
        write({ "tools.py": TOOLS_SOURCE, "helpers/text.py": HELPERS_SOURCE });
        const document = await detector.detect(root);

        expect(document.backend).toEqual({ type: "python-module", config: { module: "tools.py", cwd: root } });
        expect(document.tools).toEqual([
            {
                name: "slugify",
                description: "Make a URL slug.",
                function: "helpers.text:slugify",
                parameters: [{ name: "value", type: "string", description: "Value", required: true }]
            },
            {
                name: "add",
                description: "Add two numbers.",
                function: "add",
                parameters: [
                    { name: "a", type: "integer", description: "A", required: true },
                    { name: "b", type: "integer", description: "B", required: false, default: 2 }
                ]
            },
            {
                name: "shout",
                description: "Shout the text back.",
                function: "shout",
                parameters: [{ name: "text", type: "string", description: "Text", required: true }]
            }
        ]);
        expect(validateConfig(document).isValid).toBe(true);
    });

    it("keeps analysing when a source file has syntax errors", async () => {
        write({ "tools.py": TOOLS_SOURCE, "broken.py": "))) = = (((\n" });
        const document = await detector.detect(root);

        expect(document.backend).toEqual({ type: "python-module", config: { module: "tools.py", cwd: root } });
        expect(document.tools.map(tool => tool.name)).toEqual(["add", "shout"]);
    });

    it("produces the same document on every run", async () => {
        write({ "app.py": FLASK_SOURCE, "tools.py": TOOLS_SOURCE });
        const first = await detector.detect(root);
        const second = await detector.detect(root);
        expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });

    it("fails when there is nothing to analyse", async () => {
        write({ "README.md": "# Empty\n" });
        await expect(detector.detect(root)).rejects.toThrow(DetectionError);
        await expect(detector.detect(root)).rejects.toThrow(`No recognizable surface: no Python sources under ${root}`);
    });
});

describe("detector helpers", () => {
    it("derives dotted module names", () => {
        expect(dottedModule("helpers/text.py")).toBe("helpers.text");
        expect(dottedModule("pkg/__init__.py")).toBe("pkg");
        expect(dottedModule("tools.py")).toBe("tools");
    });

    it("renames repeated tool names", () => {
        const tools = dedupeNames([{ name: "run" }, { name: "run" }, { name: "run_2" }, { name: "run" }]);
        expect(tools.map(tool => tool.name)).toEqual(["run", "run_3", "run_2", "run_4"]);
    });
});
