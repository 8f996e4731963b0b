const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;
const WHOLE_PLACEHOLDER_PATTERN = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/;

export function placeholder(name: string): string {
    return `{${name}}`;
}

/** Names referenced by a single template token, in order of appearance. */
export function extractPlaceholders(token: string): string[] {
    const names: string[] = [];
    for (const match of token.matchAll(PLACEHOLDER_PATTERN)) {
        names.push(match[1]);
    }
    return names;
}

export function collectPlaceholders(tokens: readonly string[]): Set<string> {
    const names = new Set<string>();
    for (const token of tokens) {
        for (const name of extractPlaceholders(token)) {
            names.add(name);
        }
    }
    return names;
}

/** Returns the parameter name when the token is exactly one placeholder. */
export function wholePlaceholder(token: string): string | undefined {
    const match = WHOLE_PLACEHOLDER_PATTERN.exec(token);
    return match ? match[1] : undefined;
}

export function substitutePlaceholders(token: string, resolve: (name: string) => string): string {
    return token.replace(PLACEHOLDER_PATTERN, (_match, name: string) => resolve(name));
}

export function isFlagToken(token: string): boolean {
    return token.startsWith("-") && token.length > 1 && extractPlaceholders(token).length === 0;
}
