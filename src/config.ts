import { DEFAULT_INTERPRETER, DEFAULT_SCRIPT_DIR } from './executor/Executor.ts';
import { parseBoolean, parsePositiveInt } from './util/cli.ts';

export interface RunConfig {
  interpreter: string;
  scriptDir: string;
  debug: boolean;
  keep: boolean;
  compileOnly: boolean;
  /** Output path for the compiled program. */
  outPath?: string;
  shutdownTimeoutMs: number;
}

export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  'debug',
  'keep',
  'compile-only',
]);

const nonEmpty = (raw: string | undefined): string | undefined =>
  raw === undefined || raw.trim() === '' ? undefined : raw;

/** Flags first, then CURATE_* environment variables, then defaults. */
export const resolveRunConfig = (
  options: Map<string, string>,
  env: NodeJS.ProcessEnv = process.env,
): RunConfig => {
  const config: RunConfig = {
    interpreter:
      nonEmpty(options.get('interpreter')) ??
      nonEmpty(env.CURATE_INTERPRETER) ??
      DEFAULT_INTERPRETER,
    scriptDir:
      nonEmpty(options.get('script-dir')) ??
      nonEmpty(env.CURATE_SCRIPT_DIR) ??
      DEFAULT_SCRIPT_DIR,
    debug: parseBoolean(options.get('debug'), parseBoolean(env.CURATE_DEBUG, false)),
    keep: parseBoolean(options.get('keep'), false),
    compileOnly: parseBoolean(options.get('compile-only'), false),
    shutdownTimeoutMs: parsePositiveInt(options.get('shutdown-timeout-ms'), 30_000),
  };
  const outPath = nonEmpty(options.get('out'));
  if (outPath !== undefined) {
    config.outPath = outPath;
  }
  return config;
};
