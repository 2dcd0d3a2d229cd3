/**
 * A whole generation run: descriptor set → service models → source → files
 */
import { mkdir } from "fs/promises";
import { join } from "path";

import type { DebugLogger } from "../cli/utils";
import { resolveOptions, type FileNameFn, type GenerationOptionsInput } from "../config/options";
import { loadProtoFiles } from "../descriptor/proto-loader";
import type { DescriptorSet } from "../descriptor/types";
import { duplicateModuleName } from "../errors";
import { buildServiceModels } from "../model/builder";
import type { ServiceModel } from "../model/types";
import { ServiceGenerator } from "./service-generator";
import { moduleName, renderModuleIndex, writeIfChanged, writeService } from "./writer";

export interface CompileResult {
    /** One path per service, in service order */
    files: string[];
    /** Path of the module index, when one is configured */
    index?: string;
    /** Whether the module index was rewritten */
    indexWritten?: boolean;
}

/**
 * Parse .proto files and generate bindings for every service they declare.
 */
export async function compile(
    protos: string[],
    includes: string[],
    input: GenerationOptionsInput = {},
    debug?: DebugLogger,
): Promise<CompileResult> {
    const options = resolveOptions(input);

    debug?.group("Parsing proto files");
    debug?.log("Inputs:", protos);
    debug?.log("Includes:", includes);

    return compileDescriptorSet(loadProtoFiles(protos, includes), options, debug);
}

/**
 * Generate bindings for every service in an already loaded descriptor set.
 */
export async function compileDescriptorSet(
    set: DescriptorSet,
    input: GenerationOptionsInput = {},
    debug?: DebugLogger,
): Promise<CompileResult> {
    const options = resolveOptions(input);

    debug?.group("Building service models");
    const services = buildServiceModels(set, options);
    debug?.log(`Found ${services.length} service(s) in ${set.files.length} file(s)`);
    assertDistinctModules(services, options.fileName);

    await mkdir(options.outDir, { recursive: true });

    debug?.group("Generating services");
    const generator = new ServiceGenerator(options);
    const files: string[] = [];
    for (const service of services) {
        generator.generate(service);
        const source = generator.finalize();

        const path = await writeService(service, source, options);
        debug?.log(`${service.package || "<root>"}.${service.name} → ${path}`);
        files.push(path);
    }

    if (options.moduleIndex === false) {
        return { files };
    }

    const index = join(options.outDir, options.moduleIndex);
    const content = renderModuleIndex(services.map((service) => moduleName(service, options.fileName)));
    const indexWritten = await writeIfChanged(index, content);
    debug?.log(indexWritten ? `Wrote ${index}` : `${index} is up to date`);

    return { files, index, indexWritten };
}

/** Flattened packages can send two services to the same file; refuse before writing anything. */
function assertDistinctModules(services: ServiceModel[], fileName: FileNameFn): void {
    const owners = new Map<string, ServiceModel>();
    for (const service of services) {
        const name = moduleName(service, fileName);
        const owner = owners.get(name);
        if (owner !== undefined) {
            throw duplicateModuleName(name, qualifiedName(owner), qualifiedName(service));
        }
        owners.set(name, service);
    }
}

function qualifiedName(service: ServiceModel): string {
    return service.protoPackage ? `${service.protoPackage}.${service.identifier}` : service.identifier;
}
