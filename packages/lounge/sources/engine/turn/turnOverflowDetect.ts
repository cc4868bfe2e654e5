const OVERFLOW_MARKER = /prompt is too long/i;

/**
 * Detects the backend's context-overflow notice in assistant text.
 */
export function turnOverflowDetect(text: string): boolean {
    return OVERFLOW_MARKER.test(text);
}
