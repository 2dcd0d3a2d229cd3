/**
 * Client template
 *
 * Emits one class per service wrapping a `grpc.Client`. The streaming mode of
 * each method selects which grpc-js request helper it calls.
 */
import { routePath, streamingMode, type MethodLike, type ServiceLike } from "../../model/types";
import { dedent, indent } from "./dedent";
import { assertDistinctMembers, codecExpression, messageInput, messageOutput } from "./helpers";
import type { EmitOptions, MethodTemplate } from "./types";

export function clientClassName(service: ServiceLike): string {
    return `${service.name}Client`;
}

/** Instance members every client has, plus those of the transport */
const CLIENT_MEMBERS = ["constructor", "inner"] as const;
const TRANSPORT_MEMBERS = ["close"] as const;

/**
 * Generate the client half for a service. Services without methods produce
 * nothing. Throws `GenerationError` when a method name collides with another
 * member of the class.
 */
export function generateClient(service: ServiceLike, options: Pick<EmitOptions, "buildTransport">): string {
    if (service.methods.length === 0) {
        return "";
    }

    assertDistinctMembers(service, [...CLIENT_MEMBERS, ...(options.buildTransport ? TRANSPORT_MEMBERS : [])]);

    const className = clientClassName(service);
    const members = [
        "constructor(private readonly inner: grpc.Client) {}",
        ...(options.buildTransport ? transportMembers(className) : []),
        ...service.methods.map((method) => clientMethod(service, method)),
    ];

    return [`export class ${className} {`, members.map((member) => indent(member)).join("\n\n"), "}"].join("\n");
}

function transportMembers(className: string): string[] {
    return [
        dedent`
            static connect(
                address: string,
                credentials: grpc.ChannelCredentials = grpc.credentials.createInsecure(),
                options?: grpc.ClientOptions,
            ): ${className} {
                return new ${className}(new grpc.Client(address, credentials, options));
            }
        `,
        dedent`
            close(): void {
                this.inner.close();
            }
        `,
    ];
}

function clientMethod(service: ServiceLike, method: MethodLike): string {
    switch (streamingMode(method)) {
        case "unary":
            return unaryMethod(service, method);
        case "client-streaming":
            return clientStreamingMethod(service, method);
        case "server-streaming":
            return serverStreamingMethod(service, method);
        case "bidirectional":
            return bidirectionalMethod(service, method);
    }
}

const unaryMethod: MethodTemplate = (service, method) => dedent`
    ${method.name}(
        request: ${messageInput(method.inputType)},
        metadata: grpc.Metadata = new grpc.Metadata(),
        options: grpc.CallOptions = {},
    ): Promise<${messageOutput(method.outputType)}> {
        const codec = ${codecExpression(method, method.inputType, method.outputType)};
        return new Promise((resolve, reject) => {
            this.inner.makeUnaryRequest(
                ${JSON.stringify(routePath(service, method))},
                codec.serialize,
                codec.deserialize,
                request,
                metadata,
                options,
                (error, response) => {
                    if (error) {
                        reject(error);
                    } else if (response === undefined) {
                        reject(new Error(${JSON.stringify(`${method.routeName} returned no response`)}));
                    } else {
                        resolve(response);
                    }
                },
            );
        });
    }
`;

const clientStreamingMethod: MethodTemplate = (service, method) => dedent`
    ${method.name}(
        callback: (error: grpc.ServiceError | null, response?: ${messageOutput(method.outputType)}) => void,
        metadata: grpc.Metadata = new grpc.Metadata(),
        options: grpc.CallOptions = {},
    ): grpc.ClientWritableStream<${messageInput(method.inputType)}> {
        const codec = ${codecExpression(method, method.inputType, method.outputType)};
        return this.inner.makeClientStreamRequest(
            ${JSON.stringify(routePath(service, method))},
            codec.serialize,
            codec.deserialize,
            metadata,
            options,
            callback,
        );
    }
`;

const serverStreamingMethod: MethodTemplate = (service, method) => dedent`
    ${method.name}(
        request: ${messageInput(method.inputType)},
        metadata: grpc.Metadata = new grpc.Metadata(),
        options: grpc.CallOptions = {},
    ): grpc.ClientReadableStream<${messageOutput(method.outputType)}> {
        const codec = ${codecExpression(method, method.inputType, method.outputType)};
        return this.inner.makeServerStreamRequest(
            ${JSON.stringify(routePath(service, method))},
            codec.serialize,
            codec.deserialize,
            request,
            metadata,
            options,
        );
    }
`;

const bidirectionalMethod: MethodTemplate = (service, method) => dedent`
    ${method.name}(
        metadata: grpc.Metadata = new grpc.Metadata(),
        options: grpc.CallOptions = {},
    ): grpc.ClientDuplexStream<${messageInput(method.inputType)}, ${messageOutput(method.outputType)}> {
        const codec = ${codecExpression(method, method.inputType, method.outputType)};
        return this.inner.makeBidiStreamRequest(
            ${JSON.stringify(routePath(service, method))},
            codec.serialize,
            codec.deserialize,
            metadata,
            options,
        );
    }
`;
