/**
 * Descriptor set to service model conversion
 */
import type { DescriptorSet, FileDescriptor, MethodDescriptor, ServiceDescriptor } from "../descriptor/types";
import { invalidMethod } from "../errors";
import { identifierCase, namespaceOf, qualifyType, typeCase } from "../naming";
import type { MethodModel, ServiceModel } from "./types";

export interface ModelBuilderOptions {
    /** Codec reference stored on every method */
    codecPath: string;
}

/**
 * Build one service model per service, preserving file and declaration order.
 * Throws on the first method whose type paths cannot be resolved.
 */
export function buildServiceModels(set: DescriptorSet, options: ModelBuilderOptions): ServiceModel[] {
    return set.files.flatMap((file) => buildServices(file, options));
}

export function buildServices(file: FileDescriptor, options: ModelBuilderOptions): ServiceModel[] {
    const packageName = namespaceOf(file.package);

    return file.services.map(
        (service): ServiceModel => ({
            name: typeCase(service.name),
            identifier: service.name,
            package: packageName,
            protoPackage: file.package,
            methods: service.methods.map((method) => buildMethod(service, method, options)),
        }),
    );
}

function buildMethod(service: ServiceDescriptor, method: MethodDescriptor, options: ModelBuilderOptions): MethodModel {
    try {
        return {
            name: identifierCase(method.name),
            routeName: method.name,
            inputType: qualifyType(method.inputType),
            outputType: qualifyType(method.outputType),
            clientStreaming: method.clientStreaming,
            serverStreaming: method.serverStreaming,
            codecPath: options.codecPath,
        };
    } catch (error) {
        throw invalidMethod(service.name, method.name, error);
    }
}
