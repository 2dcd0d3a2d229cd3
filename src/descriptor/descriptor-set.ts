/**
 * Reads binary google.protobuf.FileDescriptorSet payloads, as written by
 * `protoc --descriptor_set_out`.
 */
import { readFile } from "fs/promises";
import protobuf from "protobufjs";

import { SchemaError } from "../errors";
import type { DescriptorSet, FileDescriptor, MethodDescriptor, ServiceDescriptor } from "./types";

// Subset of google/protobuf/descriptor.proto; unknown fields are skipped on decode.
const DESCRIPTOR_SCHEMA: protobuf.INamespace = {
    nested: {
        google: {
            nested: {
                protobuf: {
                    nested: {
                        FileDescriptorSet: {
                            fields: {
                                file: { rule: "repeated", type: "FileDescriptorProto", id: 1 },
                            },
                        },
                        FileDescriptorProto: {
                            fields: {
                                name: { type: "string", id: 1 },
                                package: { type: "string", id: 2 },
                                service: { rule: "repeated", type: "ServiceDescriptorProto", id: 6 },
                            },
                        },
                        ServiceDescriptorProto: {
                            fields: {
                                name: { type: "string", id: 1 },
                                method: { rule: "repeated", type: "MethodDescriptorProto", id: 2 },
                            },
                        },
                        MethodDescriptorProto: {
                            fields: {
                                name: { type: "string", id: 1 },
                                input_type: { type: "string", id: 2 },
                                output_type: { type: "string", id: 3 },
                                client_streaming: { type: "bool", id: 5 },
                                server_streaming: { type: "bool", id: 6 },
                            },
                        },
                    },
                },
            },
        },
    },
};

let fileDescriptorSet: protobuf.Type | undefined;

/**
 * Reflection type for google.protobuf.FileDescriptorSet
 */
export function fileDescriptorSetType(): protobuf.Type {
    fileDescriptorSet ??= protobuf.Root.fromJSON(DESCRIPTOR_SCHEMA).lookupType("google.protobuf.FileDescriptorSet");
    return fileDescriptorSet;
}

export function decodeDescriptorSet(bytes: Uint8Array): DescriptorSet {
    const type = fileDescriptorSetType();

    let raw: unknown;
    try {
        // A Buffer from readFile would get a BufferReader, which does not bounds-check lengths.
        raw = type.toObject(type.decode(new protobuf.Reader(bytes)), { defaults: true, arrays: true });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SchemaError(`Malformed descriptor set: ${message}`);
    }

    return {
        files: arrayField(raw, "file", "FileDescriptorSet").map(toFileDescriptor),
    };
}

export async function loadDescriptorSet(path: string): Promise<DescriptorSet> {
    return decodeDescriptorSet(await readFile(path));
}

function toFileDescriptor(raw: unknown): FileDescriptor {
    return {
        name: stringField(raw, "name", "FileDescriptorProto"),
        package: stringField(raw, "package", "FileDescriptorProto"),
        services: arrayField(raw, "service", "FileDescriptorProto").map(toServiceDescriptor),
    };
}

function toServiceDescriptor(raw: unknown): ServiceDescriptor {
    return {
        name: stringField(raw, "name", "ServiceDescriptorProto"),
        methods: arrayField(raw, "method", "ServiceDescriptorProto").map(toMethodDescriptor),
    };
}

function toMethodDescriptor(raw: unknown): MethodDescriptor {
    const owner = "MethodDescriptorProto";
    return {
        name: stringField(raw, "name", owner),
        inputType: stringField(raw, "input_type", owner),
        outputType: stringField(raw, "output_type", owner),
        clientStreaming: booleanField(raw, "client_streaming", owner),
        serverStreaming: booleanField(raw, "server_streaming", owner),
    };
}

function field(raw: unknown, key: string, owner: string): unknown {
    if (typeof raw !== "object" || raw === null) {
        throw new SchemaError(`Malformed descriptor set: ${owner} is not a message`);
    }
    return Reflect.get(raw, key);
}

function stringField(raw: unknown, key: string, owner: string): string {
    const value = field(raw, key, owner);
    if (typeof value !== "string") {
        throw new SchemaError(`Malformed descriptor set: ${owner}.${key} is not a string`);
    }
    return value;
}

function booleanField(raw: unknown, key: string, owner: string): boolean {
    const value = field(raw, key, owner);
    if (typeof value !== "boolean") {
        throw new SchemaError(`Malformed descriptor set: ${owner}.${key} is not a boolean`);
    }
    return value;
}

function arrayField(raw: unknown, key: string, owner: string): unknown[] {
    const value = field(raw, key, owner);
    if (!Array.isArray(value)) {
        throw new SchemaError(`Malformed descriptor set: ${owner}.${key} is not a list`);
    }
    return value;
}
