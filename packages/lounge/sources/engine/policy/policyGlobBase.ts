const GLOB_CHARS = /[*?[\]{}!]/;

/**
 * Returns the static directory prefix of a glob pattern, the part a match can never escape.
 * Expects: pattern uses forward slashes.
 */
export function policyGlobBase(pattern: string): string {
    const base: string[] = [];
    for (const segment of pattern.split("/")) {
        if (GLOB_CHARS.test(segment)) {
            break;
        }
        base.push(segment);
    }
    const joined = base.join("/");
    if (joined.length === 0) {
        return pattern.startsWith("/") ? "/" : ".";
    }
    return joined;
}
