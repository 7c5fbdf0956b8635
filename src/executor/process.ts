import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';

export interface ChildExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/** A started child process, reduced to what the executor supervises. */
export interface ChildHandle {
  readonly pid: number | undefined;
  readonly stdout: Readable;
  readonly stderr: Readable;
  exited(): boolean;
  /** Resolves once the process has exited; rejects when it failed to start. */
  wait(): Promise<ChildExit>;
  kill(): void;
}

export interface SpawnProcessFn {
  (command: string, args: string[], env: NodeJS.ProcessEnv): ChildHandle;
}

export const spawnProcess: SpawnProcessFn = (command, args, env) => {
  const child = spawn(command, args, {
    env,
    stdio: ['inherit', 'pipe', 'pipe'],
  });
  let exit: ChildExit | undefined;

  const done = new Promise<ChildExit>((resolve, reject) => {
    child.once('error', reject);
    child.once('exit', (code, signal) => {
      exit = { code, signal };
    });
    child.once('close', (code, signal) => {
      resolve(exit ?? { code, signal });
    });
  });

  const { stdout, stderr } = child;
  if (stdout === null || stderr === null) {
    throw new Error(`${command}: child process has no output pipes`);
  }

  return {
    pid: child.pid,
    stdout,
    stderr,
    exited: () => exit !== undefined,
    wait: () => done,
    kill: () => {
      child.kill('SIGKILL');
    },
  };
};
