/**
 * Templates for generated service bindings
 *
 * @example
 * ```typescript
 * import { generateClient, generateServer } from "protorpc-build/generator";
 *
 * const client = generateClient(service, { buildTransport: true });
 * const server = generateServer(service);
 * ```
 */

export type { EmitOptions, MethodTemplate } from "./types";

export { generateClient, clientClassName } from "./client";
export { generateServer, serverInterfaceName, serviceDefinitionName } from "./server";
export { generateHeader, GENERATED_NOTICE, type HeaderOptions } from "./header";
export { PROTOS_ALIAS } from "./helpers";
