import fs from "fs";
import os from "os";
import path from "path";
import { normalizeIgnorePattern } from "../config/IgnoreRules.js";
import { readProjectInfo, describeFromReadme } from "../detect/ProjectInfo.js";
import { ProjectScanner } from "../detect/ProjectScanner.js";
import { DetectionError } from "../errors/Errors.js";

function writeTree(root: string, files: Record<string, string>): void {
    for (const [relPath, content] of Object.entries(files)) {
        const absPath = path.join(root, relPath);
        fs.mkdirSync(path.dirname(absPath), { recursive: true });
        fs.writeFileSync(absPath, content);
    }
}

describe("ProjectScanner", () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), "surface-scan-"));
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it("collects sources in path order, honouring defaults and ignore files", () => {
        writeTree(root, {
            "app.py": "print('app')\n",
            "pkg/mod.py": "x = 1\n",
            "sub/keep.py": "y = 2\n",
            "sub/skip.py": "z = 3\n",
            "sub/.mcpignore": "# local\nskip.py\n",
            "other/skip.py": "w = 4\n",
            "tests/test_app.py": "def test_app(): pass\n",
            "venv/lib.py": "v = 0\n",
            "build/out.py": "b = 0\n",
            "generated/gen.py": "g = 0\n",
            ".gitignore": "generated/\n",
            "setup.py": "from setuptools import setup\n",
            "notes.txt": "not python\n",
            "big.py": `data = "${"x".repeat(200)}"\n`
        });

        const files = new ProjectScanner({ maxFileBytes: 100 }).scan(root);
        expect(files.map(file => file.relPath)).toEqual(["app.py", "other/skip.py", "pkg/mod.py", "sub/keep.py"]);
        expect(files[0]).toEqual({ absPath: path.join(root, "app.py"), relPath: "app.py", content: "print('app')\n" });
    });

    it("applies extra patterns", () => {
        writeTree(root, { "app.py": "", "scripts/tool.py": "" });
        const files = new ProjectScanner({ extraIgnorePatterns: ["scripts/"] }).scan(root);
        expect(files.map(file => file.relPath)).toEqual(["app.py"]);
    });

    it("fails for a missing root or a file root", () => {
        expect(() => new ProjectScanner().scan(path.join(root, "missing"))).toThrow(DetectionError);
        writeTree(root, { "app.py": "" });
        expect(() => new ProjectScanner().scan(path.join(root, "app.py"))).toThrow(
            `Project root is not a directory: ${path.join(root, "app.py")}`
        );
    });
});

describe("normalizeIgnorePattern", () => {
    it("scopes nested patterns to their directory", () => {
        expect(normalizeIgnorePattern("build/", "pkg")).toBe("pkg/**/build/");
        expect(normalizeIgnorePattern("/only.py", "pkg")).toBe("pkg/only.py");
        expect(normalizeIgnorePattern("a/b.py", "pkg")).toBe("pkg/a/b.py");
        expect(normalizeIgnorePattern("!keep.py", "pkg")).toBe("!pkg/**/keep.py");
        expect(normalizeIgnorePattern("*.log", "")).toBe("*.log");
    });
});

describe("ProjectInfo", () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), "surface-info-"));
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it("takes the name from pyproject and describes the project by name", () => {
        writeTree(root, { "pyproject.toml": "[project]\nname = \"demo-tool\"\nversion = \"0.1.0\"\n" });
        expect(readProjectInfo(root)).toEqual({ name: "demo-tool", description: "API for demo-tool" });
    });

    it("uses the README when it has a description", () => {
        writeTree(root, { "README.md": "# Notes\n\nA small service that turns notes into tasks.\n" });
        expect(readProjectInfo(root)).toEqual({
            name: path.basename(root),
            description: "A small service that turns notes into tasks."
        });
    });

    it("skips badges and short lines", () => {
        const readme = [
            "Demo",
            "====",
            "[![build](https://example.invalid/badge.svg)](https://example.invalid)",
            "Converts spreadsheets into JSON documents.",
            "Fast.",
            "",
            "## Usage"
        ].join("\n");
        expect(describeFromReadme(readme)).toBe("Converts spreadsheets into JSON documents.");
        expect(describeFromReadme("# Title only\n")).toBeUndefined();
    });
});
