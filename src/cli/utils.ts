import type { Stats } from "fs";
import { stat } from "fs/promises";
import { glob } from "glob";
import { extname, resolve } from "path";

/**
 * Expands a list of file paths, directories, or glob patterns into a list of .proto files.
 * Directories are converted to globs that match all nested .proto files.
 */
export async function expandProtoPaths(paths: string[]): Promise<string[]> {
    const allFiles = new Set<string>();

    for (const path of paths) {
        const resolvedPath = resolve(path);

        let stats: Stats;
        try {
            stats = await stat(resolvedPath);
        } catch {
            // Not an existing path, treat as a glob pattern
            const files = await glob(path, { nodir: true, absolute: true });
            files.filter((f) => extname(f) === ".proto").forEach((f) => allFiles.add(f));
            continue;
        }

        if (stats.isDirectory()) {
            const files = await glob("**/*.proto", { cwd: resolvedPath, nodir: true, absolute: true });
            files.forEach((f) => allFiles.add(f));
        } else if (stats.isFile() && extname(resolvedPath) === ".proto") {
            allFiles.add(resolvedPath);
        }
    }

    return Array.from(allFiles).sort();
}

/**
 * Debug output that is only printed when enabled
 */
export class DebugLogger {
    constructor(private readonly enabled: boolean) {}

    group(title: string): void {
        if (!this.enabled) return;
        console.log(`\n[debug] ${title}`);
    }

    log(...args: unknown[]): void {
        if (!this.enabled) return;
        console.log("[debug]  ", ...args);
    }
}
