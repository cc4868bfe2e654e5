/**
 * Keeps a balanced head/tail slice joined by an ellipsis marker when needed.
 * Expects: maxLength >= 0.
 */
export function stringTruncate(value: string, maxLength: number): string {
    if (value.length <= maxLength) {
        return value;
    }

    const safeMax = Math.max(0, maxLength);
    const headLength = Math.ceil(safeMax / 2);
    const tailLength = Math.floor(safeMax / 2);
    const truncatedChars = value.length - safeMax;
    const head = value.slice(0, headLength);
    const tail = tailLength > 0 ? value.slice(value.length - tailLength) : "";
    return `${head}...(${truncatedChars} chars)...${tail}`;
}
