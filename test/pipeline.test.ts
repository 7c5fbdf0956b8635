import { existsSync } from 'node:fs';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { createServer, type IncomingMessage, type Server } from 'node:http';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import type { SignalSource } from '../src/executor/Executor.ts';
import { spawnProcess, type ChildHandle } from '../src/executor/process.ts';
import { runFile, runSource, type RunOptions } from '../src/pipeline.ts';

const noSignals: SignalSource = {
  on: () => undefined,
  off: () => undefined,
};

const collect = (): { stream: Writable; text: () => string } => {
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

interface ModelRequest {
  authorization: string | undefined;
  body: {
    model: string;
    messages: { role: string; content: string }[];
    temperature: number;
    max_tokens: number;
  };
}

const readBody = async (req: IncomingMessage): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
};

const listen = async (server: Server): Promise<number> => {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server has no port');
  }
  return address.port;
};

const close = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));

let dir: string;
let outDir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'curate-pipeline-'));
  outDir = join(dir, 'out');
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const baseOptions = (stdout: Writable): RunOptions => ({
  interpreter: process.execPath,
  scriptDir: dir,
  stdout,
  stderr: collect().stream,
  signals: noSignals,
  env: { CURATE_OUTPUT_DIR: outDir },
});

const readJSON = async (path: string): Promise<unknown> =>
  JSON.parse(await readFile(path, 'utf8'));

describe('pipeline (generated program under node)', () => {
  test('ローカル JSON を絞り込み、フィールドを選んで保存する', async () => {
    const dataPath = join(dir, 'records.json');
    await writeFile(
      dataPath,
      JSON.stringify([
        { id: 1, text: 'alpha', score: 7, extra: true },
        { id: 2, text: 'beta', score: 3 },
        { id: 3, text: 'gamma', score: '9' },
      ]),
    );
    const stdout = collect();

    const result = await runSource(
      `FROM "${dataPath}" {\n  FIELDS [id, text]\n  FILTER score >= 5\n  GENERATE text AS summary\n  SAVE "kept.json"\n}\n`,
      { ...baseOptions(stdout.stream), scriptName: 'e2e.mjs' },
    );

    expect(result.exitCode).toBe(0);
    expect(await readJSON(join(outDir, 'kept.json'))).toEqual([
      { id: 1, text: 'alpha' },
      { id: 3, text: 'gamma' },
    ]);
    expect(stdout.text()).toContain(`Loaded 2 records from ${dataPath}\n`);
    expect(stdout.text()).toContain(
      'No model configured for GENERATE summary; skipping generation.\n',
    );
    expect(existsSync(join(dir, 'e2e.mjs'))).toBe(false);
  });

  describe('model calls', () => {
    let server: Server;
    let port: number;
    let requests: ModelRequest[];
    let onRequest: () => void;

    beforeEach(async () => {
      requests = [];
      onRequest = () => undefined;
      server = createServer((req, res) => {
        readBody(req)
          .then((raw) => {
            const body: ModelRequest['body'] = JSON.parse(raw);
            requests.push({ authorization: req.headers.authorization, body });
            onRequest();
            const user = body.messages[body.messages.length - 1]?.content ?? '';
            const reply = () => {
              if (user.includes('fail')) {
                res.writeHead(500).end('boom');
                return;
              }
              res
                .writeHead(200, { 'content-type': 'application/json' })
                .end(JSON.stringify({ choices: [{ message: { content: `  summary of ${user}  ` } }] }));
            };
            setTimeout(reply, 100);
          })
          .catch((err: unknown) => {
            res.writeHead(400).end(String(err));
          });
      });
      port = await listen(server);
    });

    afterEach(async () => {
      await close(server);
    });

    test('テンプレートとシステムプロンプトでフィールドを生成し、失敗はエラー文字列になる', async () => {
      const dataPath = join(dir, 'records.jsonl');
      await writeFile(
        dataPath,
        [
          '{"id":1,"text":"alpha","meta":{"lang":"en"}}',
          '{"id":2,"text":"beta","meta":{"lang":"de"}}',
          '',
          '{"id":3,"text":"fail","meta":{"lang":"en"}}',
        ].join('\n'),
      );
      const source = [
        'PRAGMA AUTOSAVE',
        'SYSTEM PROMPT brief "Answer in one line."',
        'PROMPT brief { FIELDS [text] "Summarize: {text}" }',
        `FROM "${dataPath}" {`,
        `  USING { MODEL test-model KEY "test-key" URL "http://127.0.0.1:${port}/v1" }`,
        '  WITH CONCURRENCY 2',
        '  FILTER meta { lang = en }',
        '  GENERATE text AS summary { PROMPT brief TEMPERATURE 0.1 TOKENS 32 }',
        '  SAVE "generated.json"',
        '}',
      ].join('\n');

      await runSource(source, baseOptions(collect().stream));

      expect(await readJSON(join(outDir, 'generated.json'))).toEqual([
        { id: 1, text: 'alpha', meta: { lang: 'en' }, summary: 'summary of Summarize: alpha' },
        {
          id: 3,
          text: 'fail',
          meta: { lang: 'en' },
          summary: '[Generation error: API error 500: boom]',
        },
      ]);
      const alpha = requests.find((r) => r.body.messages[1]?.content === 'Summarize: alpha');
      expect(alpha).toEqual({
        authorization: 'Bearer test-key',
        body: {
          model: 'test-model',
          messages: [
            { role: 'system', content: 'Answer in one line.' },
            { role: 'user', content: 'Summarize: alpha' },
          ],
          temperature: 0.1,
          max_tokens: 32,
        },
      });
      expect(requests).toHaveLength(2);
    });

    test('AUTOSAVE 有効時は割り込みで途中結果を緊急保存して終了する', async () => {
      const dataPath = join(dir, 'records.json');
      await writeFile(
        dataPath,
        JSON.stringify([
          { id: 1, text: 'alpha' },
          { id: 2, text: 'beta' },
          { id: 3, text: 'gamma' },
        ]),
      );
      let child: ChildHandle | undefined;
      onRequest = () => {
        if (child?.pid !== undefined && requests.length === 1) {
          process.kill(child.pid, 'SIGINT');
        }
      };
      const source = [
        'PRAGMA AUTOSAVE',
        `FROM "${dataPath}" {`,
        `  USING { MODEL test-model KEY "test-key" URL "http://127.0.0.1:${port}/v1" }`,
        '  GENERATE text AS summary',
        '}',
      ].join('\n');
      const stdout = collect();

      const result = await runSource(source, {
        ...baseOptions(stdout.stream),
        spawnProcess: (command, args, env) => {
          child = spawnProcess(command, args, env);
          return child;
        },
      });

      expect(result.exitCode).toBe(0);
      expect(requests).toHaveLength(1);
      const saved = (await readdir(outDir)).filter((name) =>
        /^emergency_save_\d{8}_\d{6}\.json$/u.test(name),
      );
      expect(saved).toHaveLength(1);
      expect(await readJSON(join(outDir, saved[0] ?? ''))).toEqual([
        { id: 1, text: 'alpha', summary: 'summary of alpha' },
        { id: 2, text: 'beta' },
        { id: 3, text: 'gamma' },
      ]);
      expect(stdout.text()).toContain('Interrupt received. Saving current results...\n');
    });
  });

  test('runFile はソース名から .mjs を作り、keep 指定で残す', async () => {
    const sourcePath = join(dir, 'pipeline.curate');
    await writeFile(sourcePath, 'PRAGMA CONCURRENCY 3\n');

    const result = await runFile(sourcePath, { ...baseOptions(collect().stream), keep: true });

    expect(result.scriptPath).toBe(join(dir, 'pipeline.mjs'));
    expect(existsSync(result.scriptPath)).toBe(true);
  });
});
