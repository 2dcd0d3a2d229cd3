/**
 * Protobuf codec for gRPC (`application/grpc+proto`) built on protobufjs.
 *
 * The transport hands the codec exactly one message worth of bytes per call. The
 * codec does no length-prefixing and keeps nothing between calls.
 *
 * @example
 * ```typescript
 * import { ProtobufCodec } from "protorpc-build/codec";
 * import { testing } from "./protos";
 *
 * const codec = new ProtobufCodec(testing.GetRequest, testing.GetResponse);
 * const bytes = codec.serialize({ key: "a" });
 * ```
 */
import { Metadata, status, type ServiceError } from "@grpc/grpc-js";
import protobuf from "protobufjs";

/** Anything that writes a message with protobufjs, such as a reflection `Type` or a static class. */
export interface Encodable<T> {
    encode(message: T, writer?: protobuf.Writer): protobuf.Writer;
}

/** Anything that reads a message with protobufjs. */
export interface Decodable<T> {
    decode(reader: protobuf.Reader | Uint8Array, length?: number): T;
}

/**
 * A message failed to decode. Always classified as INTERNAL: a well-behaved
 * peer never sends undecodable bytes.
 */
export class DecodeError extends Error implements ServiceError {
    readonly code = status.INTERNAL;
    readonly details: string;
    readonly metadata = new Metadata();

    constructor(details: string, options?: ErrorOptions) {
        super(`${status.INTERNAL} INTERNAL: ${details}`, options);
        this.name = "DecodeError";
        this.details = details;
    }
}

/**
 * Encoding a valid message failed, which only happens when the environment is
 * broken (e.g. out of memory). Not a status error.
 */
export class CodecInvariantError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "CodecInvariantError";
    }
}

export class ProtobufEncoder<T> {
    constructor(private readonly type: Encodable<T>) {}

    /** Write `item` into the caller's writer. */
    encode(item: T, writer: protobuf.Writer): void {
        try {
            this.type.encode(item, writer);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new CodecInvariantError(`Message only fails to encode if the environment is broken: ${message}`, {
                cause: error,
            });
        }
    }
}

export class ProtobufDecoder<T> {
    constructor(private readonly type: Decodable<T>) {}

    /**
     * Parse one framed message. `null` means no frame arrived and yields
     * `undefined`; a zero-length frame is a message with every field at its default.
     */
    decode(frame: Uint8Array): T;
    decode(frame: Uint8Array | null): T | undefined;
    decode(frame: Uint8Array | null): T | undefined {
        if (frame === null) {
            return undefined;
        }

        try {
            // Buffers would get a BufferReader, which does not bounds-check lengths.
            return this.type.decode(new protobuf.Reader(frame));
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new DecodeError(message, { cause: error });
        }
    }
}

/**
 * Encodes `TEncode` and decodes `TDecode`. A client codec encodes requests and
 * decodes responses; a server codec does the opposite.
 */
export class ProtobufCodec<TEncode, TDecode> {
    constructor(
        private readonly encodeType: Encodable<TEncode>,
        private readonly decodeType: Decodable<TDecode>,
    ) {}

    encoder(): ProtobufEncoder<TEncode> {
        return new ProtobufEncoder(this.encodeType);
    }

    decoder(): ProtobufDecoder<TDecode> {
        return new ProtobufDecoder(this.decodeType);
    }

    /** Serializer in the shape @grpc/grpc-js expects */
    readonly serialize = (value: TEncode): Buffer => {
        const writer = protobuf.Writer.create();
        this.encoder().encode(value, writer);
        return Buffer.from(writer.finish());
    };

    /** Deserializer in the shape @grpc/grpc-js expects */
    readonly deserialize = (bytes: Buffer): TDecode => this.decoder().decode(bytes);
}
