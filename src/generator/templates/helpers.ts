/**
 * Shared helpers for the service templates
 */
import { parseCodeReference } from "../../config/options";
import { memberNameClash } from "../../errors";
import type { MethodLike, ServiceLike } from "../../model/types";

/** Local name the generated file imports the message module under */
export const PROTOS_ALIAS = "$protos";

/** "$protos" + ".testing.GetRequest" */
export function typeRef(ref: string): string {
    return `${PROTOS_ALIAS}${ref}`;
}

/** Type a message class accepts when encoding */
export function messageInput(ref: string): string {
    return `MessageInput<typeof ${typeRef(ref)}>`;
}

/** Type a message class produces when decoding */
export function messageOutput(ref: string): string {
    return `MessageOutput<typeof ${typeRef(ref)}>`;
}

/** Codec that encodes `encodeRef` and decodes `decodeRef` */
export function codecExpression(method: MethodLike, encodeRef: string, decodeRef: string): string {
    const { exportName } = parseCodeReference(method.codecPath);
    return `new ${exportName}(${typeRef(encodeRef)}, ${typeRef(decodeRef)})`;
}

/**
 * Throw when two methods, or a method and one of `reserved`, end up with the
 * same generated member name.
 */
export function assertDistinctMembers(service: ServiceLike, reserved: readonly string[] = []): void {
    const taken = new Map<string, string>(reserved.map((name): [string, string] => [name, `the generated ${name} member`]));

    for (const method of service.methods) {
        const other = taken.get(method.name);
        if (other !== undefined) {
            throw memberNameClash(service.name, method.routeName, method.name, other);
        }
        taken.set(method.name, `method ${method.routeName}`);
    }
}
