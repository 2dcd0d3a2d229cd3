export type { DescriptorSet, FileDescriptor, MethodDescriptor, ServiceDescriptor } from "./types";
export { loadProtoFiles, resolveImport } from "./proto-loader";
export { decodeDescriptorSet, fileDescriptorSetType, loadDescriptorSet } from "./descriptor-set";
