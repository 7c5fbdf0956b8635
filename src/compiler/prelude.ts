// Runtime emitted ahead of `main()` in every compiled program. Kept as plain
// JavaScript so the output runs under `node` with no build step; string
// building inside uses concatenation only.

export const PROGRAM_HEADER = [
  '// Generated by curate-dsl. Edit the .curate source instead.',
  "import { spawn } from 'node:child_process';",
  "import { createReadStream } from 'node:fs';",
  "import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';",
  "import { dirname, join } from 'node:path';",
  "import { createInterface } from 'node:readline';",
].join('\n');

export const PRELUDE = String.raw`
const debug = process.env.CURATE_DEBUG === '1';
const outputDir = process.env.CURATE_OUTPUT_DIR ?? 'output';
const datasetLoader = process.env.CURATE_DATASET_LOADER ?? 'curate-fetch-dataset';
const DEFAULT_API_URL = 'https://api.openai.com/v1';
const CHUNK_SIZE = 100;
const DEBUG_RECORD_LIMIT = 5;
const REQUEST_TIMEOUT_MS = 30000;

const settings = {
  concurrency: 1,
  stream: false,
  model: null,
  apiKey: null,
  apiUrl: null,
};
let fields = [];
const filters = {};
let outputFile = 'output.json';
const datasets = new Map();
let wasSaved = false;
const promptTemplates = new Map();
const systemPrompts = new Map();
let shutdown = false;
let interruptHandlerRegistered = false;
let activeGeneration = null;

const errorMessage = (err) => (err instanceof Error ? err.message : String(err));

const lastDatasetName = () => {
  const names = [...datasets.keys()];
  const last = names[names.length - 1];
  if (last === undefined) {
    throw new Error('no dataset has been loaded');
  }
  return last;
};

const requireDataset = (name) => {
  const records = datasets.get(name);
  if (records === undefined) {
    throw new Error('dataset ' + name + ' has not been loaded');
  }
  return records;
};

const mergeDatasets = (names) => names.flatMap((name) => requireDataset(name));

const pad = (n) => String(n).padStart(2, '0');

const timestamp = () => {
  const now = new Date();
  return (
    String(now.getFullYear()) + pad(now.getMonth() + 1) + pad(now.getDate()) + '_' +
    pad(now.getHours()) + pad(now.getMinutes()) + pad(now.getSeconds())
  );
};

// Writes the most recently registered dataset. Without an explicit SAVE the
// file gets an emergency name.
const saveCurrentResults = async () => {
  if (datasets.size === 0) {
    console.log('No data to save.');
    return;
  }
  const name = lastDatasetName();
  const records = requireDataset(name);
  const filename = wasSaved ? outputFile : 'emergency_save_' + timestamp() + '.json';
  const target = join(outputDir, filename);
  console.log('Saving ' + name + ' to ' + target + '...');
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, JSON.stringify(records, null, 2) + '\n', 'utf8');
  console.log('Saved ' + records.length + ' records to ' + target);
};

const formatValue = (value) => (typeof value === 'string' ? value : JSON.stringify(value));

const renderTemplate = (template, templateFields, record) => {
  let prompt = template;
  for (const field of templateFields) {
    if (Object.hasOwn(record, field)) {
      prompt = prompt.split('{' + field + '}').join(formatValue(record[field]));
    }
  }
  return prompt;
};

const buildPrompt = (record, job) => {
  const template = job.prompt === null ? undefined : promptTemplates.get(job.prompt);
  if (template !== undefined) {
    return renderTemplate(template.template, template.fields, record);
  }
  if (!Object.hasOwn(record, job.sourceField)) {
    console.log('Warning: field ' + job.sourceField + ' is missing in record');
    return '';
  }
  return formatValue(record[job.sourceField]);
};

const preview = (text) => (text.length > 100 ? text.slice(0, 100) + '...' : text);

const callModel = async (prompt, systemPrompt, job, config) => {
  const messages = [];
  if (systemPrompt !== undefined) {
    messages.push({ role: 'system', content: systemPrompt });
  }
  messages.push({ role: 'user', content: prompt });
  if (debug) {
    console.log('Request: model=' + config.model + ' temperature=' + job.temperature);
    console.log('Prompt: ' + preview(prompt));
  }
  const baseURL = (config.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
  const res = await fetch(baseURL + '/chat/completions', {
    method: 'POST',
    headers: {
      'content-type': 'application/json',
      authorization: 'Bearer ' + config.apiKey,
    },
    body: JSON.stringify({
      model: config.model,
      messages,
      temperature: job.temperature,
      max_tokens: job.maxTokens,
    }),
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });
  if (!res.ok) {
    throw new Error('API error ' + res.status + ': ' + (await res.text()));
  }
  const json = await res.json();
  const content = json?.choices?.[0]?.message?.content;
  return typeof content === 'string' ? content.trim() : '';
};

// A failed request never aborts the batch: the error lands in the target field.
const generateItem = async (record, job, config) => {
  if (shutdown) {
    return record;
  }
  try {
    const systemPrompt = job.prompt === null ? undefined : systemPrompts.get(job.prompt);
    const response = await callModel(buildPrompt(record, job), systemPrompt, job, config);
    if (debug) {
      console.log('Response: ' + preview(response));
    }
    return { ...record, [job.targetField]: response };
  } catch (err) {
    console.log('Error calling model: ' + errorMessage(err));
    return { ...record, [job.targetField]: '[Generation error: ' + errorMessage(err) + ']' };
  }
};

const createSemaphore = (limit) => {
  let active = 0;
  const waiting = [];
  const release = () => {
    active -= 1;
    const next = waiting.shift();
    if (next !== undefined) {
      active += 1;
      next();
    }
  };
  return async (task) => {
    if (active >= limit) {
      await new Promise((resolve) => waiting.push(resolve));
    } else {
      active += 1;
    }
    try {
      return await task();
    } finally {
      release();
    }
  };
};

// Chunks run one after another; items within a chunk share the semaphore.
// Records not reached before shutdown are kept unchanged.
const generateBatches = async (records, job, config) => {
  const limit = createSemaphore(Math.max(1, config.concurrency));
  const results = [];
  for (let start = 0; start < records.length; start += CHUNK_SIZE) {
    if (shutdown) {
      results.push(...records.slice(start));
      break;
    }
    const chunk = records.slice(start, start + CHUNK_SIZE);
    console.log('Processing records ' + (start + 1) + '-' + (start + chunk.length) + ' of ' + records.length);
    results.push(...(await Promise.all(chunk.map((record) => limit(() => generateItem(record, job, config))))));
  }
  return results;
};

const generateContent = async (records, job, baseConfig) => {
  const config = {
    ...baseConfig,
    model: job.model ?? baseConfig.model,
    apiKey: baseConfig.apiKey ?? process.env.OPENAI_API_KEY ?? null,
  };
  if (config.model === null) {
    console.log('No model configured for GENERATE ' + job.targetField + '; skipping generation.');
    return records;
  }
  if (config.apiKey === null || config.apiKey === '') {
    console.log('No API key configured for GENERATE ' + job.targetField + '; skipping generation.');
    return records;
  }
  const selected = debug ? records.slice(0, DEBUG_RECORD_LIMIT) : records;
  console.log('Generating ' + job.targetField + ' for ' + selected.length + ' records with ' + config.model + '...');
  const run = generateBatches(selected, job, config);
  activeGeneration = run;
  try {
    const generated = await run;
    return debug ? [...generated, ...records.slice(DEBUG_RECORD_LIMIT)] : generated;
  } finally {
    activeGeneration = null;
  }
};

const generateLatest = async (job, config) => {
  const name = lastDatasetName();
  datasets.set(name, await generateContent(requireDataset(name), job, config));
};

const resolvePath = (record, path) => {
  if (typeof record !== 'object' || record === null) {
    return undefined;
  }
  if (Object.hasOwn(record, path)) {
    return record[path];
  }
  let cursor = record;
  for (const key of path.split('.')) {
    if (typeof cursor !== 'object' || cursor === null || !Object.hasOwn(cursor, key)) {
      return undefined;
    }
    cursor = cursor[key];
  }
  return cursor;
};

const compareValue = (actual, op, expected) => {
  if (actual === undefined || actual === null) {
    return false;
  }
  const left = typeof expected === 'number' ? Number(actual) : formatValue(actual);
  switch (op) {
    case '=':
      return left === expected;
    case '!=':
      return left !== expected;
    case '>':
      return left > expected;
    case '<':
      return left < expected;
    case '>=':
      return left >= expected;
    case '<=':
      return left <= expected;
    default:
      throw new Error('unsupported filter operator: ' + op);
  }
};

const matchesFilters = (record, activeFilters) =>
  Object.entries(activeFilters).every(([key, filter]) =>
    compareValue(resolvePath(record, key), filter.op, filter.value),
  );

const selectFields = (record, selected) => {
  const out = {};
  for (const field of selected) {
    if (Object.hasOwn(record, field)) {
      out[field] = record[field];
    }
  }
  return out;
};

const parseRecord = (line, source, lineNo) => {
  try {
    return JSON.parse(line);
  } catch (err) {
    throw new Error('invalid JSON in ' + source + ' at line ' + lineNo + ': ' + errorMessage(err));
  }
};

const readLines = async (input, source, onRecord) => {
  let lineNo = 0;
  for await (const line of createInterface({ input, crlfDelay: Infinity })) {
    lineNo += 1;
    if (line.trim() !== '') {
      onRecord(parseRecord(line, source, lineNo));
    }
  }
};

const isLocalFile = async (path) => {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (err?.code === 'ENOENT' || err?.code === 'ENOTDIR') {
      return false;
    }
    throw err;
  }
};

const fetchRemote = (name, streaming, onRecord) => {
  const args = [name, '--split', 'train'];
  if (streaming) {
    args.push('--streaming');
  }
  const child = spawn(datasetLoader, args, { stdio: ['ignore', 'pipe', 'inherit'] });
  const exited = new Promise((resolve, reject) => {
    child.on('error', (err) => reject(new Error('failed to start ' + datasetLoader + ': ' + errorMessage(err))));
    child.on('close', (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(datasetLoader + ' exited with code ' + code + ' while loading ' + name));
      }
    });
  });
  return Promise.all([readLines(child.stdout, name, onRecord), exited]).catch((err) => {
    child.kill();
    throw err;
  });
};

const readRecords = async (name, streaming, keep) => {
  const records = [];
  const onRecord = (record) => {
    if (keep(record)) {
      records.push(record);
    }
  };
  const local = (name.endsWith('.json') || name.endsWith('.jsonl')) && (await isLocalFile(name));
  if (!local) {
    await fetchRemote(name, streaming, onRecord);
  } else if (name.endsWith('.jsonl')) {
    await readLines(createReadStream(name), name, onRecord);
  } else {
    const parsed = JSON.parse(await readFile(name, 'utf8'));
    if (!Array.isArray(parsed)) {
      throw new Error(name + ' must contain a JSON array of records');
    }
    for (const record of parsed) {
      onRecord(record);
    }
  }
  return records;
};

const loadDataset = async (name, options) => {
  console.log('Loading dataset ' + name + '...');
  if (debug && Object.keys(options.filters).length > 0) {
    console.log('Applying filters: ' + JSON.stringify(options.filters));
  }
  const records = await readRecords(name, options.stream, (record) => matchesFilters(record, options.filters));
  console.log('Loaded ' + records.length + ' records from ' + name);
  if (options.fields.length === 0) {
    return records;
  }
  if (debug) {
    console.log('Selecting fields: ' + options.fields.join(', '));
  }
  return records.map((record) => selectFields(record, options.fields));
};

// Registered by PRAGMA AUTOSAVE.
const onInterrupt = () => {
  if (shutdown) {
    return;
  }
  shutdown = true;
  console.log('\nInterrupt received. Saving current results...');
  Promise.resolve(activeGeneration)
    .catch((err) => console.log('Generation failed during shutdown: ' + errorMessage(err)))
    .then(() => new Promise((resolve) => setImmediate(resolve)))
    .then(() => saveCurrentResults())
    .then(
      () => {
        console.log('Shutting down.');
        process.exit(0);
      },
      (err) => {
        console.error('Error saving results: ' + errorMessage(err));
        process.exit(1);
      },
    );
};
`;

export const PROGRAM_FOOTER = String.raw`
main().catch((err) => {
  console.error('Error: ' + errorMessage(err));
  process.exitCode = 1;
});
`;
