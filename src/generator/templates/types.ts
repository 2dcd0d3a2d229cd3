/**
 * Common types for the service templates
 */
import type { GenerationOptions } from "../../config/options";
import type { MethodLike, ServiceLike } from "../../model/types";

/** Options that shape the emitted text */
export type EmitOptions = Pick<GenerationOptions, "protoPath" | "buildClient" | "buildServer" | "buildTransport">;

/** Renders one method of a service */
export type MethodTemplate = (service: ServiceLike, method: MethodLike) => string;
