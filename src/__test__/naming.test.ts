import { describe, expect, it } from "vitest";

import { SchemaError } from "../errors";
import { identifierCase, namespaceOf, qualifyType, splitWords, typeCase } from "../naming";

describe("splitWords", () => {
    it("should split on case transitions", () => {
        expect(splitWords("GetBidirectionalStreaming")).toEqual(["Get", "Bidirectional", "Streaming"]);
    });

    it("should keep acronyms together", () => {
        expect(splitWords("HTTPServer")).toEqual(["HTTP", "Server"]);
    });

    it("should split on separators and after digits", () => {
        expect(splitWords("getV2Item")).toEqual(["get", "V2", "Item"]);
        expect(splitWords("debugpb_Debug-grpc")).toEqual(["debugpb", "Debug", "grpc"]);
    });
});

describe("identifierCase", () => {
    it("should convert method names", () => {
        expect(identifierCase("GetUnary")).toBe("get_unary");
        expect(identifierCase("GetClientStreaming")).toBe("get_client_streaming");
    });

    it("should convert file base names", () => {
        expect(identifierCase("testing_Streaming")).toBe("testing_streaming");
        expect(identifierCase("debugpb_Debug_grpc")).toBe("debugpb_debug_grpc");
    });

    it("should leave identifiers already in the convention alone", () => {
        expect(identifierCase("get_unary")).toBe("get_unary");
    });
});

describe("typeCase", () => {
    it("should fuse capitalized words", () => {
        expect(typeCase("get_request")).toBe("GetRequest");
        expect(typeCase("GetRequest")).toBe("GetRequest");
        expect(typeCase("HTTPRequest")).toBe("HttpRequest");
    });
});

describe("namespaceOf", () => {
    it("should return the last segment only", () => {
        expect(namespaceOf("package_1.package_2.package_3")).toBe("package_3");
        expect(namespaceOf("testing")).toBe("testing");
    });

    it("should return an empty namespace for an empty package", () => {
        expect(namespaceOf("")).toBe("");
    });
});

describe("qualifyType", () => {
    it("should treat absolute and relative paths alike", () => {
        expect(qualifyType(".pkg.Msg", "$protos")).toBe("$protos.pkg.Msg");
        expect(qualifyType("pkg.Msg", "$protos")).toBe("$protos.pkg.Msg");
    });

    it("should not add a namespace for single segment paths", () => {
        expect(qualifyType("Msg", "root")).toBe(`root.${typeCase("Msg")}`);
        expect(qualifyType(".Msg", "root")).toBe("root.Msg");
    });

    it("should convert only the type name", () => {
        expect(qualifyType(".my_pkg.sub_pkg.get_request")).toBe(".my_pkg.sub_pkg.GetRequest");
    });

    it("should keep nested message paths", () => {
        expect(qualifyType(".pkg.Outer.Inner", "$protos")).toBe("$protos.pkg.Outer.Inner");
    });

    it("should reject empty paths and segments", () => {
        expect(() => qualifyType("")).toThrow(SchemaError);
        expect(() => qualifyType(".")).toThrow(SchemaError);
        expect(() => qualifyType("pkg..Msg")).toThrow(SchemaError);
        expect(() => qualifyType("pkg.")).toThrow('Invalid type path "pkg.": type path contains an empty segment');
    });
});
