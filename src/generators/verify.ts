/**
 * Syntax verification of emitted source.
 *
 * @packageDocumentation
 */

import { Project, ts } from 'ts-morph';
import { EmissionError, type EmissionDiagnostic } from '../errors.js';
import type { GeneratorName } from './types.js';

const VIRTUAL_FILE = 'bindings.ts';

/**
 * Parses source text and lists its syntax diagnostics. Types are not
 * checked, since the runtime module may not be resolvable here.
 *
 * @param source - Emitted module text.
 * @returns Diagnostics in source order; empty when the text parses.
 */
export function syntaxDiagnostics(source: string): EmissionDiagnostic[] {
  const project = new Project({
    useInMemoryFileSystem: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022, noLib: true },
  });
  const sourceFile = project.createSourceFile(VIRTUAL_FILE, source);
  return project
    .getProgram()
    .getSyntacticDiagnostics(sourceFile)
    .map((diagnostic) => {
      const message = diagnostic.getMessageText();
      return {
        line: diagnostic.getLineNumber(),
        message: typeof message === 'string' ? message : message.getMessageText(),
      };
    });
}

/**
 * Checks that emitted source parses.
 *
 * @throws EmissionError listing the syntax diagnostics otherwise.
 */
export function verifySource(source: string, generator: GeneratorName): void {
  const diagnostics = syntaxDiagnostics(source);
  if (diagnostics.length > 0) {
    throw new EmissionError(generator, diagnostics);
  }
}
