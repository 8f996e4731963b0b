import levenshtein from "fast-levenshtein";

const NON_IDENTIFIER = /[^A-Za-z0-9_]+/g;

/** `process_data` -> "Process data", `getUserName` -> "Get user name". */
export function humanize(identifier: string): string {
    const words = identifier
        .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
        .split(/[_\-\s]+/)
        .filter(word => word.length > 0)
        .map(word => word.toLowerCase());
    if (words.length === 0) {
        return identifier;
    }
    const sentence = words.join(" ");
    return sentence.charAt(0).toUpperCase() + sentence.slice(1);
}

/**
 * Makes an arbitrary label usable as a tool or parameter name:
 * `[A-Za-z_][A-Za-z0-9_]*`.
 */
export function sanitizeIdentifier(value: string, fallback = "tool"): string {
    const cleaned = value
        .replace(NON_IDENTIFIER, "_")
        .replace(/_+/g, "_")
        .replace(/^_+(?=.)/, "")
        .replace(/_+$/, "");
    if (cleaned.length === 0) {
        return fallback;
    }
    return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

/**
 * Candidates close to `target`, nearest first. Substring matches count as
 * close regardless of edit distance.
 */
export function findSimilar(target: string, candidates: readonly string[], limit = 3): string[] {
    const needle = target.toLowerCase();
    const threshold = Math.max(2, Math.floor(needle.length / 3));
    return candidates
        .map(candidate => {
            const lowered = candidate.toLowerCase();
            const contains = needle.length > 0 && (lowered.includes(needle) || needle.includes(lowered));
            return { candidate, distance: contains ? 0 : levenshtein.get(needle, lowered) };
        })
        .filter(entry => entry.distance <= threshold)
        .sort((a, b) => a.distance - b.distance || a.candidate.localeCompare(b.candidate))
        .slice(0, limit)
        .map(entry => entry.candidate);
}
