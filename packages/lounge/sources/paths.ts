import path from "node:path";

function resolveLoungeRoot(): string {
    const root = process.env.LOUNGE_ROOT_DIR?.trim();
    if (root) {
        return path.resolve(root);
    }
    return path.resolve("data");
}

export const DEFAULT_LOUNGE_DIR = resolveLoungeRoot();

export function resolveLoungePath(...segments: string[]): string {
    return path.join(DEFAULT_LOUNGE_DIR, ...segments);
}
