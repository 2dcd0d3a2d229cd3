import { relative } from "path";

import { loadConfigFile } from "../config/file";
import type { GenerationOptionsInput } from "../config/options";
import { loadDescriptorSet } from "../descriptor/descriptor-set";
import { ConfigError } from "../errors";
import { compile, compileDescriptorSet, type CompileResult } from "../generator/compile";
import { DebugLogger, expandProtoPaths } from "./utils";

export interface GenerateOptions {
    includes?: string[];
    descriptorSet?: string;
    config?: string;
    debug?: boolean;
    /** Flags given on the command line; they take precedence over the config file */
    overrides?: GenerationOptionsInput;
}

/**
 * Generate service bindings from .proto files or a binary descriptor set
 */
export async function generateServices(paths: string[], options: GenerateOptions = {}): Promise<CompileResult> {
    const debug = new DebugLogger(options.debug ?? false);

    debug.group("Command Arguments");
    debug.log("Command: generate");
    debug.log("Input paths:", paths);
    debug.log("Descriptor set:", options.descriptorSet ?? "none");
    debug.log("Config file:", options.config ?? "none");

    const config = options.config ? await loadConfigFile(options.config) : { options: {}, includes: [] };
    const generation: GenerationOptionsInput = { ...config.options, ...options.overrides };
    const includes = [...config.includes, ...(options.includes ?? [])];

    debug.group("Resolved Options");
    debug.log("Proto path:", generation.protoPath ?? "(default)");
    debug.log("Codec path:", generation.codecPath ?? "(default)");
    debug.log("Output directory:", generation.outDir ?? "(OUT_DIR)");
    debug.log("Includes:", includes);

    let result: CompileResult;
    if (options.descriptorSet) {
        if (paths.length > 0) {
            throw new ConfigError("Pass either .proto inputs or --descriptor-set, not both");
        }
        result = await compileDescriptorSet(await loadDescriptorSet(options.descriptorSet), generation, debug);
    } else {
        const files = await expandProtoPaths(paths);
        debug.log(`Total .proto files found: ${files.length}`);
        if (files.length === 0) {
            throw new ConfigError("No .proto files found");
        }
        result = await compile(files, includes, generation, debug);
    }

    for (const file of result.files) {
        console.log(`Generated ${relative(process.cwd(), file)}`);
    }
    if (result.index && result.indexWritten) {
        console.log(`Updated ${relative(process.cwd(), result.index)}`);
    }

    return result;
}
