import * as fs from "fs";
import * as path from "path";

export interface ProjectInfo {
    name: string;
    description: string;
}

const NAME_ASSIGNMENT = /name\s*=\s*["']([^"']+)["']/;
const README_NAMES = ["README.md", "README.rst", "README.txt", "README", "readme.md"];

export function readProjectInfo(projectRoot: string): ProjectInfo {
    const rootPath = path.resolve(projectRoot);
    const name = projectName(rootPath);
    const readme = readFirst(rootPath, README_NAMES);
    const description = (readme !== undefined ? describeFromReadme(readme) : undefined) ?? `API for ${name}`;
    return { name, description };
}

function projectName(rootPath: string): string {
    for (const file of ["pyproject.toml", "setup.py"]) {
        const content = readFirst(rootPath, [file]);
        const match = content !== undefined ? NAME_ASSIGNMENT.exec(content) : null;
        if (match) {
            return match[1];
        }
    }
    return path.basename(rootPath);
}

/**
 * First substantial lines after the README title, skipping badges and bare
 * links.
 */
export function describeFromReadme(content: string): string | undefined {
    const collected: string[] = [];
    let foundTitle = false;
    for (const raw of content.split(/\r?\n/)) {
        const line = raw.trim();
        if (line.length === 0) {
            if (collected.length > 0) break;
            continue;
        }
        if (line.startsWith("#") || /^[=\-~]{3,}$/.test(line)) {
            if (collected.length > 0) break;
            foundTitle = true;
            continue;
        }
        if (line.includes("[![") || /^https?:\/\//.test(line)) {
            continue;
        }
        if (foundTitle && line.length > 20) {
            collected.push(line);
            if (collected.join(" ").length > 100) break;
        }
    }
    const description = collected.join(" ");
    return description.length > 0 ? description : undefined;
}

function readFirst(rootPath: string, names: string[]): string | undefined {
    for (const name of names) {
        const filePath = path.join(rootPath, name);
        try {
            if (fs.statSync(filePath).isFile()) {
                return fs.readFileSync(filePath, "utf-8");
            }
        } catch {
            continue;
        }
    }
    return undefined;
}
