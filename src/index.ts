export * from "./errors";
export * from "./naming";
export * from "./descriptor";
export * from "./model";
export * from "./config";
export * from "./generator";
export { DecodeError, CodecInvariantError, ProtobufCodec, ProtobufDecoder, ProtobufEncoder } from "./codec";
export type { Decodable, Encodable } from "./codec";
