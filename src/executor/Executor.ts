import { mkdir, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import {
  spawnProcess as defaultSpawnProcess,
  type ChildExit,
  type ChildHandle,
  type SpawnProcessFn,
} from './process.ts';

export const DEFAULT_SCRIPT_NAME = 'curate_script.mjs';
export const DEFAULT_INTERPRETER = 'node';
export const DEFAULT_SCRIPT_DIR = 'output';

const WATCHED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): void;
  off(signal: NodeJS.Signals, listener: () => void): void;
}

const processSignals: SignalSource = {
  on: (signal, listener) => {
    process.on(signal, listener);
  },
  off: (signal, listener) => {
    process.off(signal, listener);
  },
};

export interface ExecutorOptions {
  interpreter?: string | undefined;
  /** Where the program is written when no destination path is given. */
  scriptDir?: string | undefined;
  /** Passed to the program as CURATE_DEBUG. */
  debug?: boolean | undefined;
  /** Grace period after an interrupt before the child is killed. */
  shutdownTimeoutMs?: number | undefined;
  pollIntervalMs?: number | undefined;
  stdout?: Writable | undefined;
  stderr?: Writable | undefined;
  /** Extra environment on top of the parent's. */
  env?: NodeJS.ProcessEnv | undefined;
  spawnProcess?: SpawnProcessFn | undefined;
  signals?: SignalSource | undefined;
  log?: ((line: string) => void) | undefined;
}

export interface ExecutionResult {
  scriptPath: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** True when an interrupt reached the executor while the child ran. */
  interrupted: boolean;
  stdout: string;
  stderr: string;
}

export class ExecutionError extends Error {
  readonly scriptPath: string;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    message: string,
    details: {
      scriptPath: string;
      exitCode?: number | null;
      signal?: NodeJS.Signals | null;
      stdout?: string;
      stderr?: string;
      cause?: unknown;
    },
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ExecutionError';
    this.scriptPath = details.scriptPath;
    this.exitCode = details.exitCode ?? null;
    this.signal = details.signal ?? null;
    this.stdout = details.stdout ?? '';
    this.stderr = details.stderr ?? '';
  }
}

const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/** Forward `input` line by line to `output`, returning everything seen. */
const drain = async (input: Readable, output: Writable): Promise<string> => {
  const lines: string[] = [];
  for await (const line of createInterface({ input, crlfDelay: Infinity })) {
    lines.push(line);
    output.write(`${line}\n`);
  }
  return lines.join('\n');
};

const isCleanExit = (exit: ChildExit): boolean =>
  exit.code === 0 || exit.signal === 'SIGINT' || exit.signal === 'SIGTERM';

/**
 * Runs a compiled program in a child interpreter and supervises it.
 *
 * Interrupts are not forwarded: the child shares the terminal and receives
 * them itself. The executor only gives it `shutdownTimeoutMs` to save and
 * exit before killing it.
 */
export class Executor {
  private readonly interpreter: string;
  private readonly scriptDir: string;
  private readonly debug: boolean;
  private readonly shutdownTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly stdout: Writable;
  private readonly stderr: Writable;
  private readonly env: NodeJS.ProcessEnv;
  private readonly spawnProcess: SpawnProcessFn;
  private readonly signals: SignalSource;
  private readonly log: (line: string) => void;

  constructor(options: ExecutorOptions = {}) {
    this.interpreter = options.interpreter ?? DEFAULT_INTERPRETER;
    this.scriptDir = options.scriptDir ?? DEFAULT_SCRIPT_DIR;
    this.debug = options.debug ?? false;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 30_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.env = options.env ?? {};
    this.spawnProcess = options.spawnProcess ?? defaultSpawnProcess;
    this.signals = options.signals ?? processSignals;
    this.log = options.log ?? ((line) => console.log(line));
  }

  get defaultScriptPath(): string {
    return join(this.scriptDir, DEFAULT_SCRIPT_NAME);
  }

  async run(
    programText: string,
    keepFile = false,
    destinationPath?: string,
  ): Promise<ExecutionResult> {
    const scriptPath =
      destinationPath === undefined || destinationPath === ''
        ? this.defaultScriptPath
        : destinationPath;
    try {
      await mkdir(dirname(scriptPath), { recursive: true });
      await writeFile(scriptPath, programText, 'utf8');
    } catch (err) {
      throw new ExecutionError(`failed to write ${scriptPath}: ${errorMessage(err)}`, {
        scriptPath,
        cause: err,
      });
    }

    const result = await this.supervise(scriptPath);

    if (keepFile) {
      this.log(`program kept at ${scriptPath}`);
    } else {
      try {
        await rm(scriptPath, { force: true });
      } catch (err) {
        throw new ExecutionError(`failed to remove ${scriptPath}: ${errorMessage(err)}`, {
          scriptPath,
          cause: err,
        });
      }
    }
    return result;
  }

  private async supervise(scriptPath: string): Promise<ExecutionResult> {
    if (this.debug) {
      this.log(`running ${this.interpreter} ${scriptPath}`);
    }

    let child: ChildHandle;
    try {
      child = this.spawnProcess(this.interpreter, [scriptPath], {
        ...process.env,
        ...this.env,
        CURATE_DEBUG: this.debug ? '1' : '0',
      });
    } catch (err) {
      throw new ExecutionError(`failed to start ${this.interpreter}: ${errorMessage(err)}`, {
        scriptPath,
        cause: err,
      });
    }

    const exit = child.wait();
    const watcher = this.watchSignals(child);
    let stdout: string;
    let stderr: string;
    let status: ChildExit;
    try {
      [stdout, stderr, status] = await Promise.all([
        drain(child.stdout, this.stdout),
        drain(child.stderr, this.stderr),
        exit,
      ]);
    } catch (err) {
      throw new ExecutionError(`failed to run ${this.interpreter} ${scriptPath}: ${errorMessage(err)}`, {
        scriptPath,
        cause: err,
      });
    } finally {
      watcher.dispose();
    }

    if (!isCleanExit(status)) {
      const reason =
        status.signal !== null ? `signal ${status.signal}` : `exit code ${String(status.code)}`;
      throw new ExecutionError(`program ${scriptPath} failed with ${reason}`, {
        scriptPath,
        exitCode: status.code,
        signal: status.signal,
        stdout,
        stderr,
      });
    }

    return {
      scriptPath,
      exitCode: status.code,
      signal: status.signal,
      interrupted: watcher.interrupted(),
      stdout,
      stderr,
    };
  }

  // The first signal detaches the listeners, then races the grace timeout
  // against exit polling.
  private watchSignals(child: ChildHandle): { interrupted(): boolean; dispose(): void } {
    let interrupted = false;
    let poll: NodeJS.Timeout | undefined;
    let timeout: NodeJS.Timeout | undefined;

    const detach = (): void => {
      for (const signal of WATCHED_SIGNALS) {
        this.signals.off(signal, onSignal);
      }
    };
    const stopTimers = (): void => {
      clearInterval(poll);
      clearTimeout(timeout);
    };
    const onSignal = (): void => {
      detach();
      interrupted = true;
      this.log('interrupt received, waiting for the program to save and exit...');
      poll = setInterval(() => {
        if (child.exited()) {
          stopTimers();
        }
      }, this.pollIntervalMs);
      timeout = setTimeout(() => {
        stopTimers();
        if (!child.exited()) {
          this.log(`program did not exit within ${this.shutdownTimeoutMs}ms, killing it`);
          child.kill();
        }
      }, this.shutdownTimeoutMs);
    };

    for (const signal of WATCHED_SIGNALS) {
      this.signals.on(signal, onSignal);
    }

    return {
      interrupted: () => interrupted,
      dispose: () => {
        detach();
        stopTimers();
      },
    };
  }
}
