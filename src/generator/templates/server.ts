/**
 * Server template
 *
 * Emits the handler interface, the grpc-js service definition and a helper that
 * registers an implementation on a `grpc.Server`.
 */
import { routePath, streamingMode, type MethodLike, type ServiceLike } from "../../model/types";
import { dedent, indent } from "./dedent";
import { assertDistinctMembers, codecExpression, messageInput, messageOutput } from "./helpers";

export function serverInterfaceName(service: ServiceLike): string {
    return `${service.name}Server`;
}

export function serviceDefinitionName(service: ServiceLike): string {
    return `${service.name}Service`;
}

const HANDLER_TYPES = {
    unary: "grpc.handleUnaryCall",
    "client-streaming": "grpc.handleClientStreamingCall",
    "server-streaming": "grpc.handleServerStreamingCall",
    bidirectional: "grpc.handleBidiStreamingCall",
} as const;

/**
 * Generate the server half for a service.
 */
export function generateServer(service: ServiceLike): string {
    assertDistinctMembers(service);

    const serverName = serverInterfaceName(service);
    const definitionName = serviceDefinitionName(service);

    const handlers = service.methods.map((method) => indent(`${method.name}: ${handlerType(method)};`));
    const definitions = service.methods.map((method) => indent(methodDefinition(service, method)));

    return [
        `export interface ${serverName} extends grpc.UntypedServiceImplementation {`,
        ...handlers,
        "}",
        "",
        `export const ${definitionName}: grpc.ServiceDefinition<${serverName}> = {`,
        ...definitions,
        "};",
        "",
        dedent`
            export function add${serverName}(server: grpc.Server, implementation: ${serverName}): void {
                server.addService(${definitionName}, implementation);
            }
        `,
    ].join("\n");
}

function handlerType(method: MethodLike): string {
    // The server decodes requests and encodes responses.
    return `${HANDLER_TYPES[streamingMode(method)]}<${messageOutput(method.inputType)}, ${messageInput(method.outputType)}>`;
}

function methodDefinition(service: ServiceLike, method: MethodLike): string {
    const clientCodec = codecExpression(method, method.inputType, method.outputType);
    const serverCodec = codecExpression(method, method.outputType, method.inputType);

    return dedent`
        ${method.name}: {
            path: ${JSON.stringify(routePath(service, method))},
            originalName: ${JSON.stringify(method.routeName)},
            requestStream: ${method.clientStreaming},
            responseStream: ${method.serverStreaming},
            requestSerialize: ${clientCodec}.serialize,
            requestDeserialize: ${serverCodec}.deserialize,
            responseSerialize: ${serverCodec}.serialize,
            responseDeserialize: ${clientCodec}.deserialize,
        },
    `;
}
