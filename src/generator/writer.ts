/**
 * Output file naming and persistence
 */
import { readFile, writeFile } from "fs/promises";
import { join } from "path";

import type { FileNameFn, GenerationOptions } from "../config/options";
import { identifierCase } from "../naming";
import type { ServiceLike } from "../model/types";

/**
 * Module name for a service: the configured file name, identifier-cased
 */
export function moduleName(service: Pick<ServiceLike, "package" | "name">, fileName: FileNameFn): string {
    return identifierCase(fileName(service.package, service.name));
}

/**
 * Write one service's source unconditionally and return the written path.
 */
export async function writeService(
    service: Pick<ServiceLike, "package" | "name">,
    source: string,
    options: Pick<GenerationOptions, "outDir" | "fileName" | "extension">,
): Promise<string> {
    const path = join(options.outDir, `${moduleName(service, options.fileName)}.${options.extension}`);
    await writeFile(path, source);
    return path;
}

/**
 * Write `content` only if the file is missing or differs. Returns whether a
 * write happened.
 */
export async function writeIfChanged(path: string, content: string): Promise<boolean> {
    let previous: string | undefined;
    try {
        previous = await readFile(path, "utf-8");
    } catch (error) {
        if (!isNotFound(error)) throw error;
    }

    if (previous === content) {
        return false;
    }

    await writeFile(path, content);
    return true;
}

/**
 * Index re-exporting every generated module under its own name
 */
export function renderModuleIndex(moduleNames: string[]): string {
    return moduleNames.map((name) => `export * as ${name} from "./${name}";\n`).join("");
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
