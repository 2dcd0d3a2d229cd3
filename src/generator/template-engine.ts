/**
 * Minimal template engine for string interpolation
 * Supports ${variable} syntax for variable replacement
 */

export type TemplateContext = Record<string, string>;

/**
 * Replace ${var} with values from context. Unknown variables are an error,
 * use $$ to output a literal $ character.
 */
export function render(template: string, context: TemplateContext): string {
    // First, replace $$ with a placeholder
    const placeholder = "\x00DOLLAR\x00";
    const withPlaceholder = template.replace(/\$\$/g, placeholder);

    const result = withPlaceholder.replace(/\$\{([^}]+)\}/g, (_match, expr: string) => {
        const name = expr.trim();
        const value = context[name];
        if (value === undefined) {
            throw new Error(`Unknown template variable "${name}"`);
        }
        return value;
    });

    // Finally, restore the literal $ characters
    return result.replace(new RegExp(placeholder, "g"), "$");
}

/**
 * List the variables a template refers to
 */
export function templateVariables(template: string): string[] {
    const withoutEscapes = template.replace(/\$\$/g, "");
    return Array.from(withoutEscapes.matchAll(/\$\{([^}]+)\}/g), (match) => (match[1] ?? "").trim());
}
