/**
 * Header template: imports and the message type helpers shared by every
 * service in a generated file.
 */
import type { CodeReference } from "../../config/options";
import { dedent } from "./dedent";
import { PROTOS_ALIAS } from "./helpers";

export const GENERATED_NOTICE = "// Code generated by protorpc-build. DO NOT EDIT.";

export interface HeaderOptions {
    protoPath: string;
    /** Codecs referenced by the accumulated methods; empty when there are none */
    codecs: CodeReference[];
}

export function generateHeader(options: HeaderOptions): string {
    const lines = [GENERATED_NOTICE, `import * as grpc from "@grpc/grpc-js";`];

    if (options.codecs.length === 0) {
        return lines.join("\n");
    }

    const byModule = new Map<string, string[]>();
    for (const { module, exportName } of options.codecs) {
        const names = byModule.get(module) ?? [];
        if (!names.includes(exportName)) names.push(exportName);
        byModule.set(module, names);
    }
    for (const [module, names] of byModule) {
        lines.push(`import { ${names.join(", ")} } from ${JSON.stringify(module)};`);
    }
    lines.push(`import * as ${PROTOS_ALIAS} from ${JSON.stringify(options.protoPath)};`);

    return [
        lines.join("\n"),
        dedent`
            type MessageInput<M extends { encode(...args: never[]): unknown }> = Parameters<M["encode"]>[0];
            type MessageOutput<M extends { decode(...args: never[]): unknown }> = ReturnType<M["decode"]>;
        `,
    ].join("\n\n");
}
