export { ServiceGenerator } from "./service-generator";
export { compile, compileDescriptorSet, type CompileResult } from "./compile";
export { moduleName, renderModuleIndex, writeIfChanged, writeService } from "./writer";
export { assertValidSource } from "./syntax";
export { generateClient, generateServer, generateHeader, type EmitOptions } from "./templates";
