import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { BOOLEAN_FLAGS, resolveRunConfig, type RunConfig } from '../src/config.ts';
import { ExecutionError } from '../src/executor/Executor.ts';
import { compileFromText, runFile } from '../src/pipeline.ts';
import { parseCLIArgs } from '../src/util/cli.ts';

const USAGE =
  'usage: tsx scripts/curate.ts <file.curate> [--compile-only] [--out path] ' +
  '[--keep] [--debug] [--interpreter cmd] [--script-dir dir] [--shutdown-timeout-ms n]';

interface CLIArgs {
  sourcePath: string;
  config: RunConfig;
}

const main = async (): Promise<void> => {
  const args = parseArgs(process.argv.slice(2));

  if (args.config.compileOnly) {
    const source = await readFile(args.sourcePath, 'utf8');
    const programText = compileFromText(source, { debug: args.config.debug });
    if (args.config.outPath === undefined) {
      process.stdout.write(programText);
      return;
    }
    const outPath = resolve(args.config.outPath);
    await writeFile(outPath, programText, 'utf8');
    console.log(`compiled: ${outPath}`);
    return;
  }

  const result = await runFile(args.sourcePath, {
    interpreter: args.config.interpreter,
    scriptDir: args.config.scriptDir,
    debug: args.config.debug,
    keep: args.config.keep,
    shutdownTimeoutMs: args.config.shutdownTimeoutMs,
  });
  if (result.interrupted) {
    console.log('interrupted; partial results were saved by the program');
  }
};

const parseArgs = (argv: string[]): CLIArgs => {
  const { positionals, options } = parseCLIArgs(argv, BOOLEAN_FLAGS);
  if (options.has('help')) {
    console.log(USAGE);
    process.exit(0);
  }
  const [sourcePath, ...rest] = positionals;
  if (sourcePath === undefined || rest.length > 0) {
    throw new Error(USAGE);
  }
  return { sourcePath, config: resolveRunConfig(options) };
};

main().catch((err) => {
  if (err instanceof ExecutionError) {
    // stderr of the program has already been streamed
    console.error(err.message);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
