import * as fs from "fs";
import { describeError } from "../errors/Errors.js";

/** Reads a persisted configuration document as untyped JSON. */
export function loadConfigFile(configPath: string): unknown {
    const raw = fs.readFileSync(configPath, "utf-8");
    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new Error(`${configPath} is not valid JSON: ${describeError(error)}`);
    }
}
