import fs from "node:fs";
import path from "node:path";

import { pathSanitize } from "./pathSanitize.js";

const MAX_LINK_HOPS = 40;

/**
 * Resolves a path to its absolute, symlink-free form without touching anything that does not exist.
 * Relative targets resolve against base. Missing trailing segments are appended to the real path
 * of their nearest existing ancestor; dangling links are followed to where they point.
 * Throws on sanitization failures, link loops, or filesystem errors other than ENOENT.
 */
export function policyPathResolve(base: string, target: string): string {
    pathSanitize(target);
    return realPathNearest(path.resolve(base, target));
}

/**
 * Checks whether target equals base or lies beneath it. Both must already be resolved.
 */
export function pathIsWithin(base: string, target: string): boolean {
    const relative = path.relative(base, target);
    if (relative === "") {
        return true;
    }
    // "..notes.md" is a child; only a ".." segment escapes.
    return relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

function realPathNearest(absolute: string): string {
    const missing: string[] = [];
    let current = absolute;
    let hops = 0;

    for (;;) {
        try {
            const real = fs.realpathSync(current);
            return missing.length === 0 ? real : path.join(real, ...[...missing].reverse());
        } catch (error) {
            if (!errorIsMissing(error)) {
                throw error;
            }
        }

        const link = linkTargetRead(current);
        if (link !== null) {
            hops += 1;
            if (hops > MAX_LINK_HOPS) {
                throw new Error("Too many symbolic links.");
            }
            current = path.resolve(path.dirname(current), link);
            continue;
        }

        const parent = path.dirname(current);
        if (parent === current) {
            return path.join(current, ...[...missing].reverse());
        }
        missing.push(path.basename(current));
        current = parent;
    }
}

function linkTargetRead(target: string): string | null {
    try {
        const stats = fs.lstatSync(target);
        return stats.isSymbolicLink() ? fs.readlinkSync(target) : null;
    } catch (error) {
        if (errorIsMissing(error)) {
            return null;
        }
        throw error;
    }
}

function errorIsMissing(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
