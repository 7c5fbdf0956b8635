export type FilterOperator = '=' | '>' | '<' | '>=' | '<=' | '!=';

export const FILTER_OPERATORS: readonly FilterOperator[] = [
  '=',
  '>',
  '<',
  '>=',
  '<=',
  '!=',
];

export type FilterValue =
  | { kind: 'string'; value: string }
  | { kind: 'integer'; value: number };

export type UsingSetting = 'MODEL' | 'KEY' | 'URL';

export type PromptType = 'system' | 'user';

export interface Program {
  kind: 'program';
  statements: Statement[];
}

export interface Block {
  kind: 'block';
  statements: Statement[];
}

export interface FromStatement {
  kind: 'from';
  dataset: string;
  block?: Block;
}

export type WithStatement =
  | { kind: 'with'; setting: 'CONCURRENCY'; value: number; block?: Block }
  | { kind: 'with'; setting: 'STREAM'; value: true; block?: Block };

export interface FieldsStatement {
  kind: 'fields';
  fields: string[];
}

export interface UsingStatement {
  kind: 'using';
  setting: UsingSetting;
  value: string;
}

export interface UsingBlock {
  kind: 'using_block';
  entries: UsingStatement[];
}

export interface FilterCondition {
  field: string;
  operator: FilterOperator;
  value: FilterValue;
}

export interface FilterStatement extends FilterCondition {
  kind: 'filter';
}

export interface FilterBlock {
  kind: 'filter_block';
  field: string;
  conditions: FilterCondition[];
}

export interface MergeStatement {
  kind: 'merge';
  datasets: string[];
}

export interface SaveStatement {
  kind: 'save';
  filename: string;
}

export interface GenerateStatement {
  kind: 'generate';
  sourceField: string;
  targetField: string;
  model?: string;
  temperature: number;
  maxTokens: number;
  /** Declared prompt names in source order; only the first one is used. */
  prompts: string[];
}

export interface PromptStatement {
  kind: 'prompt';
  name: string;
  template: string;
  /** Record fields substituted into `{field}` placeholders (user prompts only). */
  fields: string[];
  promptType: PromptType;
}

export type PragmaStatement =
  | { kind: 'pragma'; directive: 'AUTOSAVE' }
  | { kind: 'pragma'; directive: 'CONCURRENCY'; value: number };

export type Statement =
  | FromStatement
  | WithStatement
  | FieldsStatement
  | UsingStatement
  | UsingBlock
  | FilterStatement
  | FilterBlock
  | MergeStatement
  | SaveStatement
  | GenerateStatement
  | PromptStatement
  | PragmaStatement;

export type StatementKind = Statement['kind'];

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1024;
