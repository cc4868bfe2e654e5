import { stringTruncate } from "../../util/stringTruncate.js";

const PREVIEW_LENGTH = 120;
const SECRET_ASSIGNMENT = /\b(token|secret|password|passwd|api[_-]?key)(\s*[=:]\s*)("[^"]*"|'[^']*'|\S+)/gi;

/**
 * Renders an action argument for logs: JSON-quoted so control characters stay visible,
 * secret-looking assignments masked, and the result truncated unless maxLength is null.
 */
export function policyArgumentPreview(value: unknown, maxLength: number | null = PREVIEW_LENGTH): string {
    if (value === null || value === undefined) {
        return "<none>";
    }
    let rendered: string;
    try {
        rendered = JSON.stringify(value) ?? String(value);
    } catch {
        rendered = String(value);
    }
    const masked = rendered.replace(SECRET_ASSIGNMENT, "$1$2[REDACTED]");
    return maxLength === null ? masked : stringTruncate(masked, maxLength);
}
