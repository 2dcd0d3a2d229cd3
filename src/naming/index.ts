/**
 * Name resolution between protobuf schema identifiers and generated TypeScript.
 */
import { invalidTypePath } from "../errors";

/** Separator between namespace segments in generated type references. */
export const NAMESPACE_SEPARATOR = ".";

/**
 * Split an identifier into words.
 *
 * Non-alphanumeric characters separate words. A lowercase letter or digit
 * followed by an uppercase letter starts a new word, and a run of uppercase
 * letters followed by a lowercase letter ends before its last letter
 * ("HTTPServer" → ["HTTP", "Server"]).
 */
export function splitWords(s: string): string[] {
    const words: string[] = [];

    for (const chunk of s.split(/[^A-Za-z0-9]+/)) {
        if (!chunk) continue;

        let start = 0;
        for (let i = 1; i < chunk.length; i++) {
            const prev = chunk.charAt(i - 1);
            const curr = chunk.charAt(i);
            const next = chunk.charAt(i + 1);

            const lowerToUpper = isLowerOrDigit(prev) && isUpper(curr);
            const acronymEnd = isUpper(prev) && isUpper(curr) && isLower(next);

            if (lowerToUpper || acronymEnd) {
                words.push(chunk.slice(start, i));
                start = i;
            }
        }
        words.push(chunk.slice(start));
    }

    return words;
}

/**
 * Convert to the callable/field-name convention: lowercase words joined by "_".
 * Used for method names and output module names.
 */
export function identifierCase(s: string): string {
    return splitWords(s)
        .map((word) => word.toLowerCase())
        .join("_");
}

/**
 * Convert to the type-name convention: capitalized words fused together.
 */
export function typeCase(s: string): string {
    return splitWords(s)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join("");
}

/**
 * ".package_1.package_2.package_3" → "package_3"
 *
 * Only the last segment survives; intermediate namespace levels are dropped.
 */
export function namespaceOf(path: string): string {
    const parts = path.split(".");
    return parts[parts.length - 1] ?? "";
}

/**
 * ".package.Message" → "<root>.package.Message"
 *
 * Namespace segments are kept verbatim, the final segment goes through
 * {@link typeCase}. A leading "." marks the schema root and adds nothing.
 */
export function qualifyType(path: string, root = ""): string {
    if (!path) {
        throw invalidTypePath(path, "type path is empty");
    }

    const parts = path.split(".");
    if (parts[0] === "") {
        // Skip root.
        parts.shift();
    }

    const typeName = parts.pop();
    if (!typeName || parts.some((part) => !part)) {
        throw invalidTypePath(path, "type path contains an empty segment");
    }

    return [root, ...parts, typeCase(typeName)].join(NAMESPACE_SEPARATOR);
}

function isUpper(c: string): boolean {
    return c >= "A" && c <= "Z";
}

function isLower(c: string): boolean {
    return c >= "a" && c <= "z";
}

function isLowerOrDigit(c: string): boolean {
    return isLower(c) || (c >= "0" && c <= "9");
}
