/**
 * Whitespace helpers for the code templates
 */

/**
 * Tag for multi-line templates: drops the blank first and last lines and the
 * margin shared by all non-blank lines. Interpolated values are inserted
 * before the margin is measured, so they should be single-line.
 */
export function dedent(strings: TemplateStringsArray, ...values: unknown[]): string {
    const text = strings.reduce((out, chunk, i) => out + String(values[i - 1]) + chunk);
    const lines = text.replace(/^[ \t]*\n/, "").replace(/\n[ \t]*$/, "").split("\n");

    const margins = lines.filter((line) => line.trim() !== "").map((line) => line.length - line.trimStart().length);
    const margin = margins.length > 0 ? Math.min(...margins) : 0;

    return lines.map((line) => (line.trim() === "" ? "" : line.slice(margin))).join("\n");
}

/**
 * Indent every non-empty line by `level` steps of four spaces
 */
export function indent(text: string, level = 1): string {
    const prefix = "    ".repeat(level);
    return text
        .split("\n")
        .map((line) => (line.trim() === "" ? "" : prefix + line))
        .join("\n");
}
