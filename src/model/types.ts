/**
 * Language-agnostic service model consumed by the code emitter.
 *
 * The emitter only depends on {@link ServiceLike} and {@link MethodLike}, so any
 * schema representation that exposes these capabilities can be generated.
 */

export interface MethodLike {
    /** Name used for the generated callable */
    readonly name: string;
    /** Wire-visible method name used for dispatch */
    readonly routeName: string;
    /** Codec reference, "<module>#<export>" */
    readonly codecPath: string;
    readonly clientStreaming: boolean;
    readonly serverStreaming: boolean;
    /** Type references relative to the proto root, e.g. ".testing.GetRequest" */
    readonly inputType: string;
    readonly outputType: string;
}

export interface ServiceLike<M extends MethodLike = MethodLike> {
    /** Name used for generated classes and file names */
    readonly name: string;
    /** Wire-visible service name */
    readonly identifier: string;
    /** Resolved single-segment namespace */
    readonly package: string;
    /** Full dotted package path, used in the wire route */
    readonly protoPackage: string;
    readonly methods: readonly M[];
}

export type MethodModel = MethodLike;

export type ServiceModel = ServiceLike<MethodModel>;

export type StreamingMode = "unary" | "client-streaming" | "server-streaming" | "bidirectional";

export function streamingMode(method: Pick<MethodLike, "clientStreaming" | "serverStreaming">): StreamingMode {
    if (method.clientStreaming && method.serverStreaming) return "bidirectional";
    if (method.clientStreaming) return "client-streaming";
    if (method.serverStreaming) return "server-streaming";
    return "unary";
}

/**
 * "/<package>.<Service>/<Method>", or "/<Service>/<Method>" without a package
 */
export function routePath(service: ServiceLike, method: MethodLike): string {
    const servicePath = service.protoPackage ? `${service.protoPackage}.${service.identifier}` : service.identifier;
    return `/${servicePath}/${method.routeName}`;
}
