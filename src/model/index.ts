export type { MethodLike, MethodModel, ServiceLike, ServiceModel, StreamingMode } from "./types";
export { routePath, streamingMode } from "./types";
export { buildServiceModels, buildServices, type ModelBuilderOptions } from "./builder";
