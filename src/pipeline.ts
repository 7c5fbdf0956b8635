import { readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { compile } from './compiler/compile.ts';
import type { CompileOptions } from './compiler/context.ts';
import { parseSource } from './dsl/parse.ts';
import {
  DEFAULT_SCRIPT_DIR,
  Executor,
  type ExecutionResult,
  type ExecutorOptions,
} from './executor/Executor.ts';

/** Tokenize, parse and compile DSL source. Throws TokenizeError or ParseError. */
export const compileFromText = (
  source: string,
  options: CompileOptions = {},
): string => compile(parseSource(source), options);

export const executeGeneratedProgram = (
  programText: string,
  keepFile: boolean,
  destinationPath?: string,
  options: ExecutorOptions = {},
): Promise<ExecutionResult> =>
  new Executor(options).run(programText, keepFile, destinationPath);

export interface RunOptions extends ExecutorOptions {
  keep?: boolean | undefined;
  /** File name of the program inside `scriptDir`; defaults to the executor's. */
  scriptName?: string | undefined;
}

/** `<scriptDir>/<name>.mjs` for a source file `<dir>/<name>.curate`. */
export const scriptNameFor = (sourcePath: string): string =>
  `${basename(sourcePath, extname(sourcePath))}.mjs`;

export const runSource = async (
  source: string,
  options: RunOptions = {},
): Promise<ExecutionResult> => {
  const programText = compileFromText(source, { debug: options.debug ?? false });
  const destination =
    options.scriptName === undefined
      ? undefined
      : join(options.scriptDir ?? DEFAULT_SCRIPT_DIR, options.scriptName);
  return executeGeneratedProgram(programText, options.keep ?? false, destination, options);
};

export const runFile = async (
  path: string,
  options: RunOptions = {},
): Promise<ExecutionResult> => {
  const source = await readFile(path, 'utf8');
  return runSource(source, { ...options, scriptName: scriptNameFor(path) });
};
