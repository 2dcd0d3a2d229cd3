import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import type { DescriptorSet, MethodDescriptor } from "../descriptor/types";

export const STREAMING_PROTO = `
syntax = "proto3";
package testing;

service Streaming {
    rpc GetUnary(GetRequest) returns (GetResponse) {}
    rpc GetClientStreaming(stream GetRequest) returns (GetResponse) {}
    rpc GetServerStreaming(GetRequest) returns (stream GetResponse) {}
    rpc GetBidirectionalStreaming(stream GetRequest) returns (stream GetResponse) {}
}

message GetRequest {
    string key = 1;
}

message GetResponse {
    bytes value = 1;
}
`;

export function method(
    name: string,
    clientStreaming: boolean,
    serverStreaming: boolean,
    overrides: Partial<MethodDescriptor> = {},
): MethodDescriptor {
    return {
        name,
        inputType: ".testing.GetRequest",
        outputType: ".testing.GetResponse",
        clientStreaming,
        serverStreaming,
        ...overrides,
    };
}

/** Descriptor set matching {@link STREAMING_PROTO} */
export function streamingDescriptorSet(): DescriptorSet {
    return {
        files: [
            {
                name: "streaming.proto",
                package: "testing",
                services: [
                    {
                        name: "Streaming",
                        methods: [
                            method("GetUnary", false, false),
                            method("GetClientStreaming", true, false),
                            method("GetServerStreaming", false, true),
                            method("GetBidirectionalStreaming", true, true),
                        ],
                    },
                ],
            },
        ],
    };
}

export async function createTmpDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), "protorpc-test-"));
}

export async function removeTmpDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}
