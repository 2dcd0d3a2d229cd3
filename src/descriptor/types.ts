// Descriptor set as produced by a schema compiler (protoc or the protobufjs parser).
// Only the parts needed for service generation are kept.

export type DescriptorSet = {
    files: FileDescriptor[];
};

export type FileDescriptor = {
    /** Schema file name, as given to the compiler */
    name: string;
    /** Dot-separated package path; empty when the file declares none */
    package: string;
    services: ServiceDescriptor[];
};

export type ServiceDescriptor = {
    name: string;
    methods: MethodDescriptor[];
};

export type MethodDescriptor = {
    name: string;
    /** Fully-qualified type path, e.g. ".testing.GetRequest" */
    inputType: string;
    outputType: string;
    clientStreaming: boolean;
    serverStreaming: boolean;
};
