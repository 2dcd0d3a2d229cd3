/**
 * Error types raised while generating bindings.
 *
 * Every error in this module is fatal to a generation run: the CLI prints the
 * message and exits, and the programmatic API rethrows it to the caller.
 */

export class ProtorpcError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** The descriptor set is malformed or carries a type path that cannot be resolved. */
export class SchemaError extends ProtorpcError {}

/** A generation option or config file entry is invalid. */
export class ConfigError extends ProtorpcError {}

/** Emitted source text failed to parse. */
export class GenerationError extends ProtorpcError {}

export function invalidTypePath(path: string, reason: string): SchemaError {
    return new SchemaError(`Invalid type path "${path}": ${reason}`);
}

export function invalidMethod(service: string, method: string, cause: unknown): SchemaError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new SchemaError(`Cannot build method ${service}.${method}: ${detail}`);
}

export function missingOutDir(): ConfigError {
    return new ConfigError("No output directory configured. Pass --out-dir or set the OUT_DIR environment variable.");
}

export function invalidCodecPath(codecPath: string): ConfigError {
    return new ConfigError(`Invalid codec path "${codecPath}". Expected "<module>#<export>".`);
}

export function invalidConfigValue(key: string, expected: string): ConfigError {
    return new ConfigError(`Invalid config value for "${key}": expected ${expected}`);
}

export function memberNameClash(service: string, method: string, memberName: string, other: string): GenerationError {
    return new GenerationError(
        `Method ${service}.${method} is generated as "${memberName}", which clashes with ${other}`,
    );
}

export function duplicateModuleName(moduleName: string, first: string, second: string): GenerationError {
    return new GenerationError(
        `Services ${first} and ${second} both map to module "${moduleName}". Use a file name template that keeps them apart.`,
    );
}
