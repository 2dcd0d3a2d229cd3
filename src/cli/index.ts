#!/usr/bin/env tsx
import { resolve } from "path";
import { parseArgs } from "util";

import { fileNameFromTemplate, type GenerationOptionsInput } from "../config/options";
import { generateServices } from "./generate";

const HELP_TEXT = `
protorpc - gRPC service bindings for TypeScript

Usage:
  protorpc <command> [options]

Commands:
  generate [files...]    Generate client and server bindings from .proto files

Generate Options:
  --include <dir>            Import search path (repeatable)
  --descriptor-set <file>    Read a binary FileDescriptorSet instead of .proto files
  --out-dir <dir>            Output directory (default: $OUT_DIR)
  --proto-path <specifier>   Module the generated code imports messages from (default: ..)
  --codec-path <ref>         Codec as "<module>#<export>" (default: protorpc-build/codec#ProtobufCodec)
  --file-name <template>     Output file name, using \${package} and \${service} (default: \${package}_\${service})
  --skip-client              Do not generate clients
  --skip-server              Do not generate servers
  --skip-transport           Do not generate connect()/close() on clients
  --index <file>             Also write a module index, only when its content changes
  --config <file>            YAML config file; command line flags take precedence
  --debug                    Print debug output

Examples:
  # Generate bindings for every .proto file under proto/
  protorpc generate proto/ --include proto --out-dir src/generated

  # Custom file names and no servers
  protorpc generate proto/debugpb.proto --include proto --out-dir gen --file-name '\${package}_\${service}_grpc' --skip-server

  # From a descriptor set written by protoc --descriptor_set_out
  protorpc generate --descriptor-set descriptors.pb --out-dir gen
`;

async function main() {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || rawArgs[0] === "--help" || rawArgs[0] === "-h") {
        console.log(HELP_TEXT);
        process.exit(0);
    }

    const command = rawArgs[0];

    if (command === "generate") {
        const { values, positionals } = parseArgs({
            args: rawArgs.slice(1),
            options: {
                include: { type: "string", multiple: true },
                "descriptor-set": { type: "string" },
                "out-dir": { type: "string" },
                "proto-path": { type: "string" },
                "codec-path": { type: "string" },
                "file-name": { type: "string" },
                "skip-client": { type: "boolean" },
                "skip-server": { type: "boolean" },
                "skip-transport": { type: "boolean" },
                index: { type: "string" },
                config: { type: "string" },
                debug: { type: "boolean" },
            },
            allowPositionals: true,
        });

        const overrides: GenerationOptionsInput = {};
        if (values["out-dir"] !== undefined) overrides.outDir = resolve(values["out-dir"]);
        if (values["proto-path"] !== undefined) overrides.protoPath = values["proto-path"];
        if (values["codec-path"] !== undefined) overrides.codecPath = values["codec-path"];
        if (values["file-name"] !== undefined) overrides.fileName = fileNameFromTemplate(values["file-name"]);
        if (values["skip-client"]) overrides.buildClient = false;
        if (values["skip-server"]) overrides.buildServer = false;
        if (values["skip-transport"]) overrides.buildTransport = false;
        if (values.index !== undefined) overrides.moduleIndex = values.index;

        if (positionals.length === 0 && values["descriptor-set"] === undefined) {
            console.error("Error: No files or directories specified");
            console.error("Usage: protorpc generate [files|dirs|globs...] --out-dir <directory>");
            process.exit(1);
        }

        await generateServices(positionals, {
            includes: (values.include ?? []).map((include) => resolve(include)),
            descriptorSet: values["descriptor-set"],
            config: values.config,
            debug: values.debug,
            overrides,
        });
    } else if (command === "help") {
        console.log(HELP_TEXT);
    } else {
        console.error(`Error: Unknown command "${command}"`);
        console.error("");
        console.log(HELP_TEXT);
        process.exit(1);
    }
}

main().catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exit(1);
});
