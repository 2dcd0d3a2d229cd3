/**
 * Builds a descriptor set from .proto sources with the protobufjs parser.
 */
import { existsSync } from "fs";
import { dirname, isAbsolute, resolve } from "path";
import protobuf from "protobufjs";

import { SchemaError } from "../errors";
import type { DescriptorSet, FileDescriptor, MethodDescriptor, ServiceDescriptor } from "./types";

/**
 * Resolve an import the way protoc does: relative to the importing file first,
 * then against each include directory in order.
 */
export function resolveImport(origin: string, target: string, includes: string[]): string {
    if (isAbsolute(target)) {
        return target;
    }

    const candidates = [
        ...(origin ? [resolve(dirname(origin), target)] : [resolve(target)]),
        ...includes.map((include) => resolve(include, target)),
    ];

    // Unresolved names fall through so protobufjs can serve its bundled google/protobuf files.
    return candidates.find((candidate) => existsSync(candidate)) ?? target;
}

/**
 * Parse the given .proto files and return one file descriptor per input, in
 * argument order. Services from imported files are not included.
 */
export function loadProtoFiles(protos: string[], includes: string[] = []): DescriptorSet {
    const root = new protobuf.Root();
    root.resolvePath = (origin, target) => resolveImport(origin, target, includes);

    try {
        root.loadSync(protos, { keepCase: true });
        root.resolveAll();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SchemaError(`Failed to parse proto files: ${message}`);
    }

    const services = collectServices(root);

    const files = protos.map((proto): FileDescriptor => {
        const filename = resolveImport("", proto, includes);
        const own = services.filter((service) => service.filename === filename);

        return {
            name: proto,
            package: own[0] ? packageOf(own[0]) : "",
            services: own.map(toServiceDescriptor),
        };
    });

    return { files };
}

function collectServices(ns: protobuf.NamespaceBase, out: protobuf.Service[] = []): protobuf.Service[] {
    for (const nested of ns.nestedArray) {
        if (nested instanceof protobuf.Service) {
            out.push(nested);
        } else if (nested instanceof protobuf.Namespace) {
            collectServices(nested, out);
        }
    }
    return out;
}

function packageOf(service: protobuf.Service): string {
    return (service.parent?.fullName ?? "").replace(/^\./, "");
}

function toServiceDescriptor(service: protobuf.Service): ServiceDescriptor {
    return {
        name: service.name,
        methods: service.methodsArray.map(toMethodDescriptor),
    };
}

function toMethodDescriptor(method: protobuf.Method): MethodDescriptor {
    return {
        name: method.name,
        inputType: method.resolvedRequestType?.fullName ?? method.requestType,
        outputType: method.resolvedResponseType?.fullName ?? method.responseType,
        clientStreaming: method.requestStream ?? false,
        serverStreaming: method.responseStream ?? false,
    };
}
