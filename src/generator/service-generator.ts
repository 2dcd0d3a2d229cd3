/**
 * Two-phase emission: `generate()` appends client and server fragments to
 * separate accumulators, `finalize()` renders them into one source file and
 * empties both.
 *
 * Call `finalize()` once per output file. Generating several services before a
 * single `finalize()` puts all of them into the same file.
 */
import { parseCodeReference, type CodeReference } from "../config/options";
import { GenerationError } from "../errors";
import type { ServiceLike } from "../model/types";
import { assertValidSource } from "./syntax";
import { generateClient } from "./templates/client";
import { generateHeader } from "./templates/header";
import { generateServer } from "./templates/server";
import type { EmitOptions } from "./templates/types";

export class ServiceGenerator {
    private clients: string[] = [];
    private servers: string[] = [];
    private codecPaths = new Set<string>();

    constructor(private readonly options: EmitOptions) {}

    /**
     * Emit the enabled halves for `service` and append them to the accumulators.
     */
    generate(service: ServiceLike): void {
        if (this.options.buildServer) {
            this.servers.push(generateServer(service));
            this.trackCodecs(service);
        }

        if (this.options.buildClient) {
            const client = generateClient(service, this.options);
            if (client) {
                this.clients.push(client);
                this.trackCodecs(service);
            }
        }
    }

    /**
     * Render client fragments first, then server fragments, and reset the
     * accumulators. Returns "" when nothing was accumulated.
     */
    finalize(): string {
        const sections = [...this.clients, ...this.servers];
        const codecPaths = [...this.codecPaths];

        this.clients = [];
        this.servers = [];
        this.codecPaths = new Set();

        if (sections.length === 0) {
            return "";
        }

        const header = generateHeader({ protoPath: this.options.protoPath, codecs: codecImports(codecPaths) });
        const source = [header, ...sections].join("\n\n") + "\n";
        assertValidSource(source);
        return source;
    }

    /** True when neither accumulator holds a fragment */
    isEmpty(): boolean {
        return this.clients.length === 0 && this.servers.length === 0;
    }

    private trackCodecs(service: ServiceLike): void {
        for (const method of service.methods) {
            this.codecPaths.add(method.codecPath);
        }
    }
}

function codecImports(codecPaths: string[]): CodeReference[] {
    const references = codecPaths.map((codecPath) => parseCodeReference(codecPath));

    const modules = new Map<string, string>();
    for (const { module, exportName } of references) {
        const existing = modules.get(exportName);
        if (existing !== undefined && existing !== module) {
            throw new GenerationError(`Codecs from "${existing}" and "${module}" share the export name ${exportName}`);
        }
        modules.set(exportName, module);
    }

    return references;
}
