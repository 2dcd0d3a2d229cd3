/**
 * Syntax check for emitted source text
 */
import { Project, type Diagnostic } from "ts-morph";

import { GenerationError } from "../errors";

let project: Project | undefined;

function getProject(): Project {
    project ??= new Project({
        useInMemoryFileSystem: true,
        compilerOptions: { noLib: true, noResolve: true },
    });
    return project;
}

function formatDiagnostic(diagnostic: Diagnostic): string {
    const text = diagnostic.getMessageText();
    const message = typeof text === "string" ? text : text.getMessageText();
    const line = diagnostic.getLineNumber();
    return line === undefined ? message : `line ${line}: ${message}`;
}

/**
 * Parse `source` as TypeScript and throw if it has syntax errors. Types and
 * imports are not checked.
 */
export function assertValidSource(source: string, fileName = "generated.ts"): void {
    const project = getProject();
    const sourceFile = project.createSourceFile(fileName, source, { overwrite: true });

    try {
        const diagnostics = project.getProgram().getSyntacticDiagnostics(sourceFile);
        if (diagnostics.length > 0) {
            throw new GenerationError(
                `Generated ${fileName} is not valid TypeScript:\n${diagnostics.map(formatDiagnostic).join("\n")}`,
            );
        }
    } finally {
        project.removeSourceFile(sourceFile);
    }
}
