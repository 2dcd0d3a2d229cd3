/**
 * YAML configuration file
 *
 * ```yaml
 * protoPath: ../protos
 * codecPath: protorpc-build/codec#ProtobufCodec
 * fileName: ${package}_${service}_grpc
 * buildClient: true
 * buildServer: false
 * buildTransport: true
 * outDir: src/generated
 * moduleIndex: index.ts
 * includes:
 *   - proto
 *   - include
 * ```
 */
import { readFile } from "fs/promises";
import { dirname, resolve } from "path";
import yaml from "js-yaml";

import { ConfigError, invalidConfigValue } from "../errors";
import { fileNameFromTemplate, type GenerationOptionsInput } from "./options";

export interface ConfigFile {
    options: GenerationOptionsInput;
    includes: string[];
}

const STRING_KEYS = ["protoPath", "codecPath", "fileName", "outDir"] as const;
const BOOLEAN_KEYS = ["buildClient", "buildServer", "buildTransport"] as const;
const KNOWN_KEYS = new Set<string>([...STRING_KEYS, ...BOOLEAN_KEYS, "moduleIndex", "includes"]);

/**
 * Validate a parsed config document. Relative `outDir` and `includes` entries
 * are resolved against `baseDir`.
 */
export function parseConfig(document: unknown, baseDir: string): ConfigFile {
    if (document === undefined || document === null) {
        return { options: {}, includes: [] };
    }
    if (typeof document !== "object" || Array.isArray(document)) {
        throw new ConfigError("Config file must contain a mapping");
    }

    const entries = new Map<string, unknown>(Object.entries(document));
    const unknownKeys = [...entries.keys()].filter((key) => !KNOWN_KEYS.has(key));
    if (unknownKeys.length > 0) {
        throw new ConfigError(`Unknown config key(s): ${unknownKeys.join(", ")}`);
    }

    const strings: Partial<Record<(typeof STRING_KEYS)[number], string>> = {};
    for (const key of STRING_KEYS) {
        const value = entries.get(key);
        if (value === undefined) continue;
        if (typeof value !== "string") throw invalidConfigValue(key, "a string");
        strings[key] = value;
    }

    const options: GenerationOptionsInput = {};
    if (strings.protoPath !== undefined) options.protoPath = strings.protoPath;
    if (strings.codecPath !== undefined) options.codecPath = strings.codecPath;
    if (strings.fileName !== undefined) options.fileName = fileNameFromTemplate(strings.fileName);
    if (strings.outDir !== undefined) options.outDir = resolve(baseDir, strings.outDir);

    for (const key of BOOLEAN_KEYS) {
        const value = entries.get(key);
        if (value === undefined) continue;
        if (typeof value !== "boolean") throw invalidConfigValue(key, "a boolean");
        options[key] = value;
    }

    const moduleIndex = entries.get("moduleIndex");
    if (moduleIndex !== undefined) {
        if (typeof moduleIndex !== "string" && moduleIndex !== false) {
            throw invalidConfigValue("moduleIndex", "a file name or false");
        }
        options.moduleIndex = moduleIndex;
    }

    const includes = entries.get("includes") ?? [];
    if (!Array.isArray(includes) || !includes.every((include): include is string => typeof include === "string")) {
        throw invalidConfigValue("includes", "a list of directories");
    }

    return {
        options,
        includes: includes.map((include) => resolve(baseDir, include)),
    };
}

export async function loadConfigFile(path: string): Promise<ConfigFile> {
    const content = await readFile(path, "utf-8");

    let document: unknown;
    try {
        document = yaml.load(content);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Failed to parse config file ${path}: ${message}`);
    }

    return parseConfig(document, dirname(resolve(path)));
}
