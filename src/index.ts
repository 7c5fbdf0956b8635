export type {
  Block,
  FieldsStatement,
  FilterBlock,
  FilterCondition,
  FilterOperator,
  FilterStatement,
  FilterValue,
  FromStatement,
  GenerateStatement,
  MergeStatement,
  PragmaStatement,
  Program,
  PromptStatement,
  PromptType,
  SaveStatement,
  Statement,
  StatementKind,
  UsingBlock,
  UsingSetting,
  UsingStatement,
  WithStatement,
} from './dsl/types.ts';
export {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  FILTER_OPERATORS,
} from './dsl/types.ts';

export {
  KEYWORDS,
  TokenizeError,
  tokenize,
  type Token,
  type TokenKind,
} from './dsl/tokenize.ts';
export { ParseError, Parser, parse, parseSource } from './dsl/parse.ts';

export { compile } from './compiler/compile.ts';
export { sanitize, type CompileOptions } from './compiler/context.ts';

export {
  DEFAULT_INTERPRETER,
  DEFAULT_SCRIPT_DIR,
  DEFAULT_SCRIPT_NAME,
  ExecutionError,
  Executor,
  type ExecutionResult,
  type ExecutorOptions,
  type SignalSource,
} from './executor/Executor.ts';
export {
  spawnProcess,
  type ChildExit,
  type ChildHandle,
  type SpawnProcessFn,
} from './executor/process.ts';

export {
  compileFromText,
  executeGeneratedProgram,
  runFile,
  runSource,
  scriptNameFor,
  type RunOptions,
} from './pipeline.ts';

export { resolveRunConfig, type RunConfig } from './config.ts';
