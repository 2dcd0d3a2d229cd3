/**
 * Generation options and their defaults
 */
import { ConfigError, invalidCodecPath, missingOutDir } from "../errors";
import { render, templateVariables } from "../generator/template-engine";

/**
 * Returns the output file base name, without extension, for a service.
 * Must be pure: it is called once per service while writing.
 */
export type FileNameFn = (packageName: string, serviceName: string) => string;

export interface GenerationOptions {
    /**
     * Import specifier of the module exporting the message classes. Type references
     * in generated code are resolved against it.
     *
     * Message names are referenced in type case (`get_request` and `HTTPRequest`
     * become `GetRequest` and `HttpRequest`), while namespace segments are kept
     * as written. The module must export its messages under those names; a
     * pbjs static module keeps schema names verbatim, so schemas whose message
     * names are not already in type case need a module that re-exports them.
     */
    protoPath: string;
    /** Codec constructed wherever generated code needs one, "<module>#<export>" */
    codecPath: string;
    buildServer: boolean;
    buildClient: boolean;
    /** Emit `connect()` and `close()` convenience methods on clients */
    buildTransport: boolean;
    fileName: FileNameFn;
    outDir: string;
    /** File name of the shared module index, or false to skip it */
    moduleIndex: string | false;
    extension: string;
}

export type GenerationOptionsInput = Partial<GenerationOptions>;

export interface CodeReference {
    module: string;
    exportName: string;
}

export const DEFAULT_PROTO_PATH = "..";
export const DEFAULT_CODEC_PATH = "protorpc-build/codec#ProtobufCodec";
export const DEFAULT_FILE_NAME_TEMPLATE = "${package}_${service}";

const FILE_NAME_VARIABLES = new Set(["package", "service"]);

/**
 * Build a file name function from a template such as "${package}_${service}_grpc".
 */
export function fileNameFromTemplate(template: string): FileNameFn {
    const unknown = templateVariables(template).filter((name) => !FILE_NAME_VARIABLES.has(name));
    if (unknown.length > 0) {
        throw new ConfigError(
            `Invalid file name template "${template}": unknown variable(s) ${unknown.join(", ")}. Use \${package} and \${service}.`,
        );
    }

    return (packageName, serviceName) => render(template, { package: packageName, service: serviceName });
}

export const defaultFileName: FileNameFn = fileNameFromTemplate(DEFAULT_FILE_NAME_TEMPLATE);

/**
 * "protorpc-build/codec#ProtobufCodec" → { module: "protorpc-build/codec", exportName: "ProtobufCodec" }
 */
export function parseCodeReference(codecPath: string): CodeReference {
    const separator = codecPath.lastIndexOf("#");
    const module = codecPath.slice(0, separator);
    const exportName = codecPath.slice(separator + 1);

    if (separator <= 0 || !/^[A-Za-z_$][A-Za-z0-9_$]*$/.test(exportName)) {
        throw invalidCodecPath(codecPath);
    }

    return { module, exportName };
}

/**
 * Merge options over the defaults. The output directory falls back to OUT_DIR.
 */
export function resolveOptions(
    input: GenerationOptionsInput = {},
    env: Record<string, string | undefined> = process.env,
): GenerationOptions {
    const outDir = input.outDir ?? env.OUT_DIR;
    if (!outDir) {
        throw missingOutDir();
    }

    const codecPath = input.codecPath ?? DEFAULT_CODEC_PATH;
    parseCodeReference(codecPath);

    return {
        protoPath: input.protoPath ?? DEFAULT_PROTO_PATH,
        codecPath,
        buildServer: input.buildServer ?? true,
        buildClient: input.buildClient ?? true,
        buildTransport: input.buildTransport ?? true,
        fileName: input.fileName ?? defaultFileName,
        outDir,
        moduleIndex: input.moduleIndex ?? false,
        extension: input.extension ?? "ts",
    };
}
