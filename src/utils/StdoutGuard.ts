import util from "util";

const ALLOW_STDOUT_LOGS = process.env.SURFACE_MCP_ALLOW_STDOUT_LOGS === "true";
const DEBUG_LOGS_ENABLED = process.env.SURFACE_MCP_DEBUG === "true";

// The stdio transport owns stdout; stray console output would corrupt frames.
if (!ALLOW_STDOUT_LOGS) {
    const redirect = (level: "info" | "debug") => (...args: unknown[]) => {
        if (level === "debug" && !DEBUG_LOGS_ENABLED) {
            return;
        }
        process.stderr.write(util.format(...args) + "\n");
    };

    console.log = redirect("info");
    console.info = redirect("info");
    console.debug = redirect("debug");
}
