import type {
  FieldsStatement,
  FilterBlock,
  FilterStatement,
  FromStatement,
  GenerateStatement,
  MergeStatement,
  PragmaStatement,
  Program,
  PromptStatement,
  SaveStatement,
  Statement,
  UsingSetting,
  UsingStatement,
  WithStatement,
} from '../dsl/types.ts';
import {
  bind,
  createContext,
  datasetVariable,
  emit,
  TOP_SCOPE,
  type CompileContext,
  type CompileOptions,
  type Scope,
} from './context.ts';
import {
  commentText,
  jsFilter,
  jsNullableString,
  jsString,
  jsStringList,
} from './literals.ts';
import { PRELUDE, PROGRAM_FOOTER, PROGRAM_HEADER } from './prelude.ts';

const SETTING_KEYS: Record<UsingSetting, string> = {
  MODEL: 'model',
  KEY: 'apiKey',
  URL: 'apiUrl',
};

const settingsTarget = (scope: Scope): string =>
  scope.kind === 'top' ? 'settings' : `settings_${scope.datasetVar}`;

const fieldsTarget = (scope: Scope): string =>
  scope.kind === 'top' ? 'fields' : `fields_${scope.datasetVar}`;

const filtersTarget = (scope: Scope): string =>
  scope.kind === 'top' ? 'filters' : `filters_${scope.datasetVar}`;

/** Effective generation settings: FROM-local overrides win over globals. */
const configExpression = (scope: Scope): string =>
  scope.kind === 'top'
    ? 'settings'
    : `{ ...settings, ...settings_${scope.datasetVar} }`;

interface Phases {
  config: Statement[];
  generate: GenerateStatement[];
  save: SaveStatement[];
}

// WITH blocks nested in a FROM block are flattened: the WITH setting itself
// joins the configuration phase, its statements are partitioned like siblings.
const partition = (statements: Statement[], phases: Phases): Phases => {
  for (const statement of statements) {
    switch (statement.kind) {
      case 'generate':
        phases.generate.push(statement);
        break;
      case 'save':
        phases.save.push(statement);
        break;
      case 'with':
        phases.config.push(withoutBlock(statement));
        if (statement.block) {
          partition(statement.block.statements, phases);
        }
        break;
      default:
        phases.config.push(statement);
    }
  }
  return phases;
};

const withoutBlock = (statement: WithStatement): WithStatement =>
  statement.setting === 'CONCURRENCY'
    ? { kind: 'with', setting: 'CONCURRENCY', value: statement.value }
    : { kind: 'with', setting: 'STREAM', value: true };

const lowerFrom = (ctx: CompileContext, statement: FromStatement): void => {
  const datasetVar = datasetVariable(statement.dataset);
  const scope: Scope = { kind: 'dataset', datasetVar };
  const phases = partition(statement.block?.statements ?? [], {
    config: [],
    generate: [],
    save: [],
  });

  emit(ctx, `// FROM ${commentText(statement.dataset)}`);
  emit(ctx, `${bind(ctx, fieldsTarget(scope))} = [...fields];`);
  emit(ctx, `${bind(ctx, filtersTarget(scope))} = { ...filters };`);
  emit(ctx, `${bind(ctx, settingsTarget(scope))} = {};`);
  for (const child of phases.config) {
    lowerStatement(ctx, child, scope);
  }
  emit(
    ctx,
    `${bind(ctx, datasetVar)} = await loadDataset(${jsString(statement.dataset)}, { ` +
      `stream: ${configExpression(scope)}.stream, ` +
      `fields: ${fieldsTarget(scope)}, ` +
      `filters: ${filtersTarget(scope)} });`,
  );
  emit(ctx, `datasets.set(${jsString(statement.dataset)}, ${datasetVar});`);
  ctx.datasets.add(datasetVar);
  for (const child of phases.generate) {
    lowerGenerate(ctx, child, scope, statement.dataset);
  }
  for (const child of phases.save) {
    lowerSave(ctx, child);
  }
  emit(ctx, '');
};

const lowerWith = (ctx: CompileContext, statement: WithStatement, scope: Scope): void => {
  const target = settingsTarget(scope);
  if (statement.setting === 'CONCURRENCY') {
    emit(ctx, `${target}.concurrency = ${statement.value};`);
  } else {
    emit(ctx, `${target}.stream = true;`);
  }
  // Only reached with a block at top level; FROM blocks flatten WITH first.
  for (const child of statement.block?.statements ?? []) {
    lowerStatement(ctx, child, scope);
  }
};

const lowerFields = (ctx: CompileContext, statement: FieldsStatement, scope: Scope): void => {
  emit(ctx, `${fieldsTarget(scope)} = ${jsStringList(statement.fields)};`);
};

const lowerUsing = (ctx: CompileContext, statement: UsingStatement, scope: Scope): void => {
  emit(
    ctx,
    `${settingsTarget(scope)}.${SETTING_KEYS[statement.setting]} = ${jsString(statement.value)};`,
  );
};

const lowerFilter = (ctx: CompileContext, statement: FilterStatement, scope: Scope): void => {
  emit(ctx, `${filtersTarget(scope)}[${jsString(statement.field)}] = ${jsFilter(statement)};`);
};

const lowerFilterBlock = (ctx: CompileContext, statement: FilterBlock, scope: Scope): void => {
  for (const condition of statement.conditions) {
    const key = `${statement.field}.${condition.field}`;
    emit(ctx, `${filtersTarget(scope)}[${jsString(key)}] = ${jsFilter(condition)};`);
  }
};

const lowerMerge = (ctx: CompileContext, statement: MergeStatement): void => {
  const name = `merged_ds_${ctx.datasets.size + 1}`;
  emit(ctx, `// MERGE ${commentText(statement.datasets.join(', '))}`);
  emit(ctx, `${bind(ctx, name)} = mergeDatasets(${jsStringList(statement.datasets)});`);
  emit(ctx, `datasets.set(${jsString(name)}, ${name});`);
  ctx.datasets.add(name);
};

const lowerSave = (ctx: CompileContext, statement: SaveStatement): void => {
  emit(ctx, `outputFile = ${jsString(statement.filename)};`);
  emit(ctx, 'wasSaved = true;');
  emit(ctx, 'await saveCurrentResults();');
};

const generateJob = (statement: GenerateStatement): string =>
  '{ ' +
  [
    `sourceField: ${jsString(statement.sourceField)}`,
    `targetField: ${jsString(statement.targetField)}`,
    `model: ${jsNullableString(statement.model)}`,
    `temperature: ${String(statement.temperature)}`,
    `maxTokens: ${String(statement.maxTokens)}`,
    `prompt: ${jsNullableString(statement.prompts[0])}`,
  ].join(', ') +
  ' }';

const lowerGenerate = (
  ctx: CompileContext,
  statement: GenerateStatement,
  scope: Scope,
  dataset?: string,
): void => {
  emit(
    ctx,
    `// GENERATE ${commentText(statement.sourceField)} AS ${commentText(statement.targetField)}`,
  );
  const ignored = statement.prompts.slice(1);
  if (ignored.length > 0) {
    emit(ctx, `// additional prompts not used: ${commentText(ignored.join(', '))}`);
  }
  if (scope.kind === 'top' || dataset === undefined) {
    emit(ctx, `await generateLatest(${generateJob(statement)}, ${configExpression(scope)});`);
    return;
  }
  emit(
    ctx,
    `${scope.datasetVar} = await generateContent(${scope.datasetVar}, ` +
      `${generateJob(statement)}, ${configExpression(scope)});`,
  );
  emit(ctx, `datasets.set(${jsString(dataset)}, ${scope.datasetVar});`);
};

const lowerPrompt = (ctx: CompileContext, statement: PromptStatement): void => {
  const name = jsString(statement.name);
  if (statement.promptType === 'system') {
    emit(ctx, `systemPrompts.set(${name}, ${jsString(statement.template)});`);
  } else {
    emit(
      ctx,
      `promptTemplates.set(${name}, { template: ${jsString(statement.template)}, ` +
        `fields: ${jsStringList(statement.fields)} });`,
    );
  }
  if (ctx.debug) {
    emit(
      ctx,
      `if (debug) console.log(${jsString(`Defined ${statement.promptType} prompt ${statement.name}`)});`,
    );
  }
};

const lowerPragma = (ctx: CompileContext, statement: PragmaStatement): void => {
  if (statement.directive === 'CONCURRENCY') {
    emit(ctx, `settings.concurrency = ${statement.value};`);
    return;
  }
  if (ctx.interruptHandling) {
    emit(ctx, '// PRAGMA AUTOSAVE: interrupt handler already registered');
    return;
  }
  ctx.interruptHandling = true;
  emit(ctx, "process.on('SIGINT', onInterrupt);");
  emit(ctx, 'interruptHandlerRegistered = true;');
  emit(ctx, "if (debug) console.log('Autosave on interrupt enabled');");
};

const lowerStatement = (ctx: CompileContext, statement: Statement, scope: Scope): void => {
  switch (statement.kind) {
    case 'from':
      lowerFrom(ctx, statement);
      return;
    case 'with':
      lowerWith(ctx, statement, scope);
      return;
    case 'fields':
      lowerFields(ctx, statement, scope);
      return;
    case 'using':
      lowerUsing(ctx, statement, scope);
      return;
    case 'using_block':
      for (const entry of statement.entries) {
        lowerUsing(ctx, entry, scope);
      }
      return;
    case 'filter':
      lowerFilter(ctx, statement, scope);
      return;
    case 'filter_block':
      lowerFilterBlock(ctx, statement, scope);
      return;
    case 'merge':
      lowerMerge(ctx, statement);
      return;
    case 'save':
      lowerSave(ctx, statement);
      return;
    case 'generate':
      lowerGenerate(ctx, statement, scope);
      return;
    case 'prompt':
      lowerPrompt(ctx, statement);
      return;
    case 'pragma':
      lowerPragma(ctx, statement);
      return;
    default: {
      const exhaustive: never = statement;
      throw new Error(`unknown statement: ${JSON.stringify(exhaustive)}`);
    }
  }
};

/**
 * Lower a parsed program into a self-contained ES module for `node`.
 * Equal programs and options always give identical text.
 */
export const compile = (program: Program, options: CompileOptions = {}): string => {
  const ctx = createContext(options);
  for (const statement of program.statements) {
    lowerStatement(ctx, statement, TOP_SCOPE);
  }
  return [
    PROGRAM_HEADER,
    PRELUDE,
    'const main = async () => {',
    ...ctx.lines,
    '};',
    PROGRAM_FOOTER,
  ].join('\n');
};
