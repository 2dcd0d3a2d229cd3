import { writeFile } from "fs/promises";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadConfigFile, parseConfig } from "../config/file";
import {
    DEFAULT_CODEC_PATH,
    DEFAULT_PROTO_PATH,
    fileNameFromTemplate,
    parseCodeReference,
    resolveOptions,
} from "../config/options";
import { ConfigError } from "../errors";
import { render, templateVariables } from "../generator/template-engine";
import { createTmpDir, removeTmpDir } from "./util";

describe("resolveOptions", () => {
    it("should fill in the defaults", () => {
        const options = resolveOptions({ outDir: "/tmp/out" }, {});

        expect(options.protoPath).toBe(DEFAULT_PROTO_PATH);
        expect(options.protoPath).toBe("..");
        expect(options.codecPath).toBe(DEFAULT_CODEC_PATH);
        expect(options.buildClient).toBe(true);
        expect(options.buildServer).toBe(true);
        expect(options.buildTransport).toBe(true);
        expect(options.moduleIndex).toBe(false);
        expect(options.extension).toBe("ts");
        expect(options.fileName("testing", "Streaming")).toBe("testing_Streaming");
    });

    it("should take the output directory from OUT_DIR", () => {
        expect(resolveOptions({}, { OUT_DIR: "/tmp/env-out" }).outDir).toBe("/tmp/env-out");
        expect(resolveOptions({ outDir: "/tmp/explicit" }, { OUT_DIR: "/tmp/env-out" }).outDir).toBe("/tmp/explicit");
    });

    it("should fail without an output directory", () => {
        expect(() => resolveOptions({}, {})).toThrow(ConfigError);
        expect(() => resolveOptions({}, { OUT_DIR: "" })).toThrow(
            "No output directory configured. Pass --out-dir or set the OUT_DIR environment variable.",
        );
    });

    it("should keep explicit values", () => {
        const options = resolveOptions(
            { outDir: "/tmp/out", buildClient: false, moduleIndex: "index.ts", codecPath: "./codec#JsonCodec" },
            {},
        );

        expect(options.buildClient).toBe(false);
        expect(options.moduleIndex).toBe("index.ts");
        expect(options.codecPath).toBe("./codec#JsonCodec");
    });

    it("should validate the codec path", () => {
        expect(() => resolveOptions({ outDir: "/tmp/out", codecPath: "ProtobufCodec" }, {})).toThrow(
            'Invalid codec path "ProtobufCodec". Expected "<module>#<export>".',
        );
    });
});

describe("parseCodeReference", () => {
    it("should split module and export", () => {
        expect(parseCodeReference("protorpc-build/codec#ProtobufCodec")).toEqual({
            module: "protorpc-build/codec",
            exportName: "ProtobufCodec",
        });
    });

    it("should split on the last separator", () => {
        expect(parseCodeReference("./a#b#Codec")).toEqual({ module: "./a#b", exportName: "Codec" });
    });

    it("should reject references without a module or a valid export", () => {
        expect(() => parseCodeReference("#Codec")).toThrow(ConfigError);
        expect(() => parseCodeReference("./codec#")).toThrow(ConfigError);
        expect(() => parseCodeReference("./codec#not-valid")).toThrow(ConfigError);
    });
});

describe("fileNameFromTemplate", () => {
    it("should substitute package and service", () => {
        expect(fileNameFromTemplate("${package}_${service}_grpc")("debugpb", "Debug")).toBe("debugpb_Debug_grpc");
        expect(fileNameFromTemplate("${service}")("debugpb", "Debug")).toBe("Debug");
    });

    it("should reject unknown variables", () => {
        expect(() => fileNameFromTemplate("${pkg}_${service}")).toThrow(
            'Invalid file name template "${pkg}_${service}": unknown variable(s) pkg. Use ${package} and ${service}.',
        );
    });
});

describe("template engine", () => {
    it("should keep escaped dollars", () => {
        expect(render("$${service}", { service: "Debug" })).toBe("${service}");
        expect(templateVariables("$${service}_${package}")).toEqual(["package"]);
    });

    it("should fail on a variable missing from the context", () => {
        expect(() => render("${service}", {})).toThrow('Unknown template variable "service"');
    });
});

describe("parseConfig", () => {
    it("should treat an empty document as no options", () => {
        expect(parseConfig(null, "/work")).toEqual({ options: {}, includes: [] });
        expect(parseConfig(undefined, "/work")).toEqual({ options: {}, includes: [] });
    });

    it("should resolve paths against the config directory", () => {
        const config = parseConfig({ outDir: "gen", includes: ["proto", "/abs/include"] }, "/work");

        expect(config.options.outDir).toBe("/work/gen");
        expect(config.includes).toEqual(["/work/proto", "/abs/include"]);
    });

    it("should accept false for the module index", () => {
        expect(parseConfig({ moduleIndex: false }, "/work").options.moduleIndex).toBe(false);
        expect(parseConfig({ moduleIndex: "index.ts" }, "/work").options.moduleIndex).toBe("index.ts");
    });

    it("should reject malformed documents", () => {
        expect(() => parseConfig(["a"], "/work")).toThrow("Config file must contain a mapping");
        expect(() => parseConfig("outDir", "/work")).toThrow(ConfigError);
        expect(() => parseConfig({ outdir: "gen" }, "/work")).toThrow("Unknown config key(s): outdir");
        expect(() => parseConfig({ buildClient: "yes" }, "/work")).toThrow(
            'Invalid config value for "buildClient": expected a boolean',
        );
        expect(() => parseConfig({ protoPath: 1 }, "/work")).toThrow(
            'Invalid config value for "protoPath": expected a string',
        );
        expect(() => parseConfig({ moduleIndex: true }, "/work")).toThrow(
            'Invalid config value for "moduleIndex": expected a file name or false',
        );
        expect(() => parseConfig({ includes: "proto" }, "/work")).toThrow(
            'Invalid config value for "includes": expected a list of directories',
        );
    });
});

describe("loadConfigFile", () => {
    let tmpDir: string;

    beforeEach(async () => {
        tmpDir = await createTmpDir();
    });

    afterEach(async () => {
        await removeTmpDir(tmpDir);
    });

    it("should read a YAML file", async () => {
        const path = join(tmpDir, "protorpc.yaml");
        await writeFile(
            path,
            [
                "protoPath: ../protos",
                "codecPath: ./codec#JsonCodec",
                "fileName: ${package}_${service}_grpc",
                "buildServer: false",
                "outDir: gen",
                "moduleIndex: index.ts",
                "includes:",
                "  - proto",
                "",
            ].join("\n"),
        );

        const config = await loadConfigFile(path);

        expect(config.options.protoPath).toBe("../protos");
        expect(config.options.codecPath).toBe("./codec#JsonCodec");
        expect(config.options.fileName?.("debugpb", "Debug")).toBe("debugpb_Debug_grpc");
        expect(config.options.buildServer).toBe(false);
        expect(config.options.buildClient).toBeUndefined();
        expect(config.options.outDir).toBe(join(tmpDir, "gen"));
        expect(config.options.moduleIndex).toBe("index.ts");
        expect(config.includes).toEqual([join(tmpDir, "proto")]);
    });

    it("should report YAML syntax errors as config errors", async () => {
        const path = join(tmpDir, "broken.yaml");
        await writeFile(path, "outDir: [gen\n");

        await expect(loadConfigFile(path)).rejects.toThrow(ConfigError);
    });
});
