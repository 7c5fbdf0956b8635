import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough, Writable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  ExecutionError,
  Executor,
  type SignalSource,
} from '../src/executor/Executor.ts';
import type { ChildExit, ChildHandle } from '../src/executor/process.ts';

class FakeChild implements ChildHandle {
  readonly pid = undefined;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  killCount = 0;
  private exit: ChildExit | undefined;
  private resolveExit: (exit: ChildExit) => void = () => undefined;
  private readonly done = new Promise<ChildExit>((resolve) => {
    this.resolveExit = resolve;
  });

  constructor(private readonly onKill: (child: FakeChild) => void = () => undefined) {}

  exited(): boolean {
    return this.exit !== undefined;
  }

  wait(): Promise<ChildExit> {
    return this.done;
  }

  kill(): void {
    this.killCount += 1;
    this.onKill(this);
  }

  finish(exit: ChildExit, out = '', err = ''): void {
    this.stdout.end(out);
    this.stderr.end(err);
    this.exit = exit;
    this.resolveExit(exit);
  }
}

class FakeSignals implements SignalSource {
  private readonly listeners = new Map<NodeJS.Signals, Set<() => void>>();

  on(signal: NodeJS.Signals, listener: () => void): void {
    const set = this.listeners.get(signal) ?? new Set<() => void>();
    set.add(listener);
    this.listeners.set(signal, set);
  }

  off(signal: NodeJS.Signals, listener: () => void): void {
    this.listeners.get(signal)?.delete(listener);
  }

  count(signal: NodeJS.Signals): number {
    return this.listeners.get(signal)?.size ?? 0;
  }

  emit(signal: NodeJS.Signals): void {
    for (const listener of [...(this.listeners.get(signal) ?? [])]) {
      listener();
    }
  }
}

const sink = (): { stream: Writable; text: () => string } => {
  const chunks: string[] = [];
  return {
    stream: new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(String(chunk));
        callback();
      },
    }),
    text: () => chunks.join(''),
  };
};

interface SpawnCall {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'curate-executor-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('Executor (fake child)', () => {
  test('正常終了で出力を転送し、スクリプトを削除する', async () => {
    const out = sink();
    const err = sink();
    const calls: SpawnCall[] = [];
    const executor = new Executor({
      scriptDir: dir,
      stdout: out.stream,
      stderr: err.stream,
      signals: new FakeSignals(),
      spawnProcess: (command, args, env) => {
        calls.push({ command, args, env });
        const child = new FakeChild();
        setImmediate(() => child.finish({ code: 0, signal: null }, 'hello\nworld\n', 'warn\n'));
        return child;
      },
    });

    const result = await executor.run('console.log("x");');

    const scriptPath = join(dir, 'curate_script.mjs');
    expect(result).toEqual({
      scriptPath,
      exitCode: 0,
      signal: null,
      interrupted: false,
      stdout: 'hello\nworld',
      stderr: 'warn',
    });
    expect(out.text()).toBe('hello\nworld\n');
    expect(err.text()).toBe('warn\n');
    expect(calls).toHaveLength(1);
    expect(calls[0]?.command).toBe('node');
    expect(calls[0]?.args).toEqual([scriptPath]);
    expect(calls[0]?.env.CURATE_DEBUG).toBe('0');
    expect(existsSync(scriptPath)).toBe(false);
  });

  test('keepFile 指定時はスクリプトを残し、debug は環境変数で渡す', async () => {
    const calls: SpawnCall[] = [];
    const destination = join(dir, 'nested', 'kept.mjs');
    const executor = new Executor({
      debug: true,
      env: { CURATE_OUTPUT_DIR: 'results' },
      stdout: sink().stream,
      stderr: sink().stream,
      signals: new FakeSignals(),
      log: () => undefined,
      spawnProcess: (command, args, env) => {
        calls.push({ command, args, env });
        const child = new FakeChild();
        setImmediate(() => child.finish({ code: 0, signal: null }));
        return child;
      },
    });

    await executor.run('// program', true, destination);

    expect(await readFile(destination, 'utf8')).toBe('// program');
    expect(calls[0]?.env.CURATE_DEBUG).toBe('1');
    expect(calls[0]?.env.CURATE_OUTPUT_DIR).toBe('results');
  });

  test('空の保存先パスは既定のスクリプトパスになる', async () => {
    const calls: SpawnCall[] = [];
    const executor = new Executor({
      scriptDir: dir,
      stdout: sink().stream,
      stderr: sink().stream,
      signals: new FakeSignals(),
      log: () => undefined,
      spawnProcess: (command, args, env) => {
        calls.push({ command, args, env });
        const child = new FakeChild();
        setImmediate(() => child.finish({ code: 0, signal: null }));
        return child;
      },
    });

    const result = await executor.run('// program', true, '');

    const scriptPath = join(dir, 'curate_script.mjs');
    expect(result.scriptPath).toBe(scriptPath);
    expect(calls[0]?.args).toEqual([scriptPath]);
    expect(await readFile(scriptPath, 'utf8')).toBe('// program');
  });

  test('非ゼロ終了は stderr を含む ExecutionError になる', async () => {
    const executor = new Executor({
      scriptDir: dir,
      stdout: sink().stream,
      stderr: sink().stream,
      signals: new FakeSignals(),
      spawnProcess: () => {
        const child = new FakeChild();
        setImmediate(() => child.finish({ code: 1, signal: null }, 'partial\n', 'boom\n'));
        return child;
      },
    });

    const error = await executor.run('x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toMatchObject({
      exitCode: 1,
      signal: null,
      stdout: 'partial',
      stderr: 'boom',
    });
    expect(existsSync(join(dir, 'curate_script.mjs'))).toBe(true);
  });

  test('SIGINT / SIGTERM による終了は成功扱い', async () => {
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      const executor = new Executor({
        scriptDir: dir,
        stdout: sink().stream,
        stderr: sink().stream,
        signals: new FakeSignals(),
        spawnProcess: () => {
          const child = new FakeChild();
          setImmediate(() => child.finish({ code: null, signal }));
          return child;
        },
      });
      await expect(executor.run('x')).resolves.toMatchObject({ signal, exitCode: null });
    }
  });

  test('割り込み後は監視をやめ、子が自分で終了すれば kill しない', async () => {
    const signals = new FakeSignals();
    let child: FakeChild | undefined;
    const executor = new Executor({
      scriptDir: dir,
      stdout: sink().stream,
      stderr: sink().stream,
      signals,
      log: () => undefined,
      pollIntervalMs: 5,
      shutdownTimeoutMs: 10_000,
      spawnProcess: () => {
        const spawned = new FakeChild();
        child = spawned;
        setImmediate(() => {
          signals.emit('SIGINT');
          setTimeout(() => spawned.finish({ code: 0, signal: null }, 'saved\n'), 20);
        });
        return spawned;
      },
    });

    const result = await executor.run('x');

    expect(result.interrupted).toBe(true);
    expect(result.stdout).toBe('saved');
    expect(child?.killCount).toBe(0);
    expect(signals.count('SIGINT')).toBe(0);
    expect(signals.count('SIGTERM')).toBe(0);
  });

  test('猶予時間内に終了しなければ kill し、エラーになる', async () => {
    const signals = new FakeSignals();
    const logs: string[] = [];
    let child: FakeChild | undefined;
    const executor = new Executor({
      scriptDir: dir,
      stdout: sink().stream,
      stderr: sink().stream,
      signals,
      log: (line) => logs.push(line),
      pollIntervalMs: 5,
      shutdownTimeoutMs: 30,
      spawnProcess: () => {
        const spawned = new FakeChild((c) => c.finish({ code: null, signal: 'SIGKILL' }));
        child = spawned;
        setImmediate(() => signals.emit('SIGTERM'));
        return spawned;
      },
    });

    const error = await executor.run('x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toMatchObject({ signal: 'SIGKILL', exitCode: null });
    expect(child?.killCount).toBe(1);
    expect(logs).toContain('program did not exit within 30ms, killing it');
  });

  test('起動に失敗すると ExecutionError', async () => {
    const executor = new Executor({
      scriptDir: dir,
      interpreter: 'missing-interpreter',
      signals: new FakeSignals(),
      spawnProcess: () => {
        throw new Error('spawn missing-interpreter ENOENT');
      },
    });

    await expect(executor.run('x')).rejects.toThrowError(
      'failed to start missing-interpreter: spawn missing-interpreter ENOENT',
    );
  });
});

describe('Executor (real node child)', () => {
  const makeExecutor = () =>
    new Executor({
      interpreter: process.execPath,
      scriptDir: dir,
      stdout: sink().stream,
      stderr: sink().stream,
      signals: new FakeSignals(),
    });

  test('SIGINT で終了した子プロセスは成功扱い', async () => {
    const result = await makeExecutor().run(
      "setTimeout(() => undefined, 5000);\nprocess.kill(process.pid, 'SIGINT');\n",
    );
    expect(result.signal).toBe('SIGINT');
  });

  test('終了コード 1 は stderr を含むエラー', async () => {
    const error = await makeExecutor()
      .run("console.error('boom');\nprocess.exitCode = 1;\n")
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toMatchObject({ exitCode: 1, stderr: 'boom' });
  });

  test('存在しないインタプリタは起動失敗のエラー', async () => {
    const executor = new Executor({
      interpreter: join(dir, 'no-such-interpreter'),
      scriptDir: dir,
      stdout: sink().stream,
      stderr: sink().stream,
      signals: new FakeSignals(),
    });
    await expect(executor.run('x')).rejects.toBeInstanceOf(ExecutionError);
  });
});
