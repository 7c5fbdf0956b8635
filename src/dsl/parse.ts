/**
 * Recursive-descent parser for the curation DSL.
 *
 * One token of lookahead, no backtracking and no error recovery: the first
 * problem aborts the parse and no partial program is returned.
 */

import { stripQuotes, tokenize, type Token } from './tokenize.ts';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  FILTER_OPERATORS,
  type Block,
  type FieldsStatement,
  type FilterBlock,
  type FilterCondition,
  type FilterOperator,
  type FilterStatement,
  type FilterValue,
  type FromStatement,
  type GenerateStatement,
  type MergeStatement,
  type PragmaStatement,
  type Program,
  type PromptStatement,
  type PromptType,
  type SaveStatement,
  type Statement,
  type UsingBlock,
  type UsingSetting,
  type UsingStatement,
  type WithStatement,
} from './types.ts';

export class ParseError extends Error {
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(message: string, token?: Token) {
    super(
      token !== undefined
        ? `Parse error at line ${token.line}, column ${token.column}: ${message}`
        : `Parse error at end of input: ${message}`,
    );
    this.name = 'ParseError';
    this.line = token?.line;
    this.column = token?.column;
  }
}

const INTEGER = /^[+-]?\d+$/u;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/u;

const isFilterOperator = (text: string): text is FilterOperator =>
  (FILTER_OPERATORS as readonly string[]).includes(text);

const isUsingSetting = (text: string): text is UsingSetting =>
  text === 'MODEL' || text === 'KEY' || text === 'URL';

const describeToken = (token: Token | undefined): string =>
  token === undefined ? 'end of input' : `'${token.text}'`;

export class Parser {
  private readonly tokens: Token[];
  private cursor = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  get position(): number {
    return this.cursor;
  }

  parseProgram(): Program {
    const statements: Statement[] = [];
    while (!this.isEOF()) {
      statements.push(this.parseStatement());
    }
    return { kind: 'program', statements };
  }

  private parseStatement(): Statement {
    const token = this.peek();
    if (token === undefined) {
      throw new ParseError('expected a statement');
    }
    if (token.kind !== 'keyword') {
      throw new ParseError(`unexpected token: ${token.text}`, token);
    }

    switch (token.text) {
      case 'FROM':
        return this.parseFrom();
      case 'WITH':
        return this.parseWith();
      case 'FIELDS':
        return this.parseFields();
      case 'USING':
        return this.parseUsing();
      case 'FILTER':
        return this.parseFilter();
      case 'MERGE':
        return this.parseMerge();
      case 'SAVE':
        return this.parseSave();
      case 'GENERATE':
        return this.parseGenerate();
      case 'PROMPT':
        this.advance();
        return this.parsePrompt('user');
      case 'PRAGMA':
        return this.parsePragma();
      case 'SYSTEM':
      case 'USER': {
        this.advance();
        const next = this.peek();
        if (!this.isKeyword(next, 'PROMPT')) {
          throw new ParseError(
            `expected PROMPT after ${token.text}, got ${describeToken(next)}`,
            next,
          );
        }
        this.advance();
        return this.parsePrompt(token.text === 'SYSTEM' ? 'system' : 'user');
      }
      default:
        throw new ParseError(`unexpected token: ${token.text}`, token);
    }
  }

  private parseFrom(): FromStatement {
    this.advance();
    const dataset = this.expectValue('dataset name after FROM');
    if (dataset === '') {
      throw new ParseError('dataset name after FROM must not be empty', this.previous());
    }
    const stmt: FromStatement = { kind: 'from', dataset };
    if (this.isPunct(this.peek(), '{')) {
      stmt.block = this.parseBlock();
    }
    return stmt;
  }

  private parseWith(): WithStatement {
    this.advance();
    const setting = this.peek();
    if (setting === undefined) {
      throw new ParseError('expected setting type after WITH');
    }
    this.advance();

    let stmt: WithStatement;
    if (this.isKeyword(setting, 'CONCURRENCY')) {
      stmt = {
        kind: 'with',
        setting: 'CONCURRENCY',
        value: this.expectPositiveInteger('WITH CONCURRENCY'),
      };
    } else if (this.isKeyword(setting, 'STREAM')) {
      stmt = { kind: 'with', setting: 'STREAM', value: true };
    } else {
      throw new ParseError(`unknown WITH type: ${setting.text}`, setting);
    }

    if (this.isPunct(this.peek(), '{')) {
      stmt.block = this.parseBlock();
    }
    return stmt;
  }

  private parseFields(): FieldsStatement {
    this.advance();
    const fields = this.parseNameList('FIELDS');
    return { kind: 'fields', fields };
  }

  private parseUsing(): UsingStatement | UsingBlock {
    this.advance();

    if (!this.isPunct(this.peek(), '{')) {
      return this.parseUsingEntry();
    }

    this.advance();
    const entries: UsingStatement[] = [];
    while (!this.isPunct(this.peek(), '}')) {
      if (this.isEOF()) {
        throw new ParseError('expected closing brace } for USING block');
      }
      entries.push(this.parseUsingEntry());
      this.skipSemicolon();
    }
    this.advance();
    return { kind: 'using_block', entries };
  }

  private parseUsingEntry(): UsingStatement {
    const setting = this.peek();
    if (setting === undefined) {
      throw new ParseError('expected USING type (MODEL, KEY, URL)');
    }
    if (setting.kind !== 'keyword' || !isUsingSetting(setting.text)) {
      throw new ParseError(
        `expected USING type (MODEL, KEY, URL), got ${describeToken(setting)}`,
        setting,
      );
    }
    this.advance();
    const value = this.expectValue(`value after USING ${setting.text}`);
    return { kind: 'using', setting: setting.text, value };
  }

  private parseFilter(): FilterStatement | FilterBlock {
    this.advance();
    const field = this.expectValue('field after FILTER');

    if (!this.isPunct(this.peek(), '{')) {
      return { kind: 'filter', ...this.parseCondition(field) };
    }

    this.advance();
    const conditions: FilterCondition[] = [];
    while (!this.isPunct(this.peek(), '}')) {
      if (this.isEOF()) {
        throw new ParseError('expected closing brace } for FILTER block');
      }
      const subfield = this.expectValue('condition field in FILTER block');
      conditions.push(this.parseCondition(subfield));
      this.skipSemicolon();
    }
    this.advance();
    return { kind: 'filter_block', field, conditions };
  }

  private parseCondition(field: string): FilterCondition {
    const op = this.peek();
    if (op === undefined) {
      throw new ParseError(`expected operator after ${field}`);
    }
    if (op.kind !== 'operator' || !isFilterOperator(op.text)) {
      throw new ParseError(
        `expected operator (=, >, <, >=, <=, !=), got ${describeToken(op)}`,
        op,
      );
    }
    this.advance();

    const raw = this.peek();
    this.expectValue(`value after ${op.text}`);
    const value: FilterValue =
      raw !== undefined && raw.kind !== 'string' && isSafeIntegerText(raw.text)
        ? { kind: 'integer', value: Number(raw.text) }
        : { kind: 'string', value: raw?.value ?? '' };

    return { field, operator: op.text, value };
  }

  private parseMerge(): MergeStatement {
    this.advance();
    let datasets: string[];

    if (this.isPunct(this.peek(), '[')) {
      datasets = this.parseNameList('MERGE', { allowEmpty: true });
    } else {
      const first = this.expectValue('dataset name after MERGE');
      const comma = this.peek();
      if (!this.isPunct(comma, ',')) {
        throw new ParseError(
          `expected ',' between datasets in MERGE, got ${describeToken(comma)}`,
          comma,
        );
      }
      this.advance();
      const second = this.expectValue('second dataset name in MERGE');
      datasets = [first, second];
    }

    if (datasets.length < 2) {
      throw new ParseError(
        'at least two datasets are required for MERGE',
        this.previous(),
      );
    }
    return { kind: 'merge', datasets };
  }

  private parseSave(): SaveStatement {
    this.advance();
    return { kind: 'save', filename: this.expectValue('filename after SAVE') };
  }

  private parseGenerate(): GenerateStatement {
    this.advance();
    const sourceField = this.expectValue('source field after GENERATE');

    const connector = this.peek();
    if (!this.isKeyword(connector, 'AS') && !this.isKeyword(connector, 'TO')) {
      throw new ParseError(
        `expected 'AS' or 'TO' after source field, got ${describeToken(connector)}`,
        connector,
      );
    }
    this.advance();
    const targetField = this.expectValue('target field after AS/TO');

    const stmt: GenerateStatement = {
      kind: 'generate',
      sourceField,
      targetField,
      temperature: DEFAULT_TEMPERATURE,
      maxTokens: DEFAULT_MAX_TOKENS,
      prompts: [],
    };

    if (!this.isPunct(this.peek(), '{')) {
      return stmt;
    }

    this.advance();
    while (!this.isPunct(this.peek(), '}')) {
      const param = this.peek();
      if (param === undefined) {
        throw new ParseError('expected closing brace } for GENERATE block');
      }
      this.advance();

      if (this.isKeyword(param, 'MODEL')) {
        stmt.model = this.expectValue('model name after MODEL');
      } else if (this.isKeyword(param, 'TEMPERATURE')) {
        stmt.temperature = this.expectDecimal('TEMPERATURE');
      } else if (this.isKeyword(param, 'TOKENS')) {
        stmt.maxTokens = this.expectPositiveInteger('TOKENS');
      } else if (this.isKeyword(param, 'PROMPT')) {
        stmt.prompts.push(this.expectValue('prompt name after PROMPT'));
      } else {
        throw new ParseError(`unknown GENERATE parameter: ${param.text}`, param);
      }
      this.skipSemicolon();
    }
    this.advance();
    return stmt;
  }

  private parsePrompt(promptType: PromptType): PromptStatement {
    const name = this.expectValue('prompt name after PROMPT');
    let fields: string[] = [];
    let template: string;

    if (this.isPunct(this.peek(), '{')) {
      this.advance();
      if (this.isKeyword(this.peek(), 'FIELDS')) {
        this.advance();
        fields = this.parseNameList('PROMPT FIELDS');
        if (this.isEOF() || this.isPunct(this.peek(), '}')) {
          throw new ParseError(
            'expected text template after field list',
            this.peek(),
          );
        }
      }

      const parts: string[] = [];
      while (!this.isPunct(this.peek(), '}')) {
        const part = this.peek();
        if (part === undefined) {
          throw new ParseError(`expected closing brace } for PROMPT ${name}`);
        }
        parts.push(part.text);
        this.advance();
      }
      this.advance();
      template = stripQuotes(parts.join(' '));
    } else {
      template = this.expectValue(`text template for PROMPT ${name}`);
    }

    return { kind: 'prompt', name, template, fields, promptType };
  }

  private parsePragma(): PragmaStatement {
    this.advance();
    const directive = this.peek();
    if (directive === undefined) {
      throw new ParseError('expected pragma type after PRAGMA');
    }
    this.advance();

    if (this.isKeyword(directive, 'AUTOSAVE')) {
      return { kind: 'pragma', directive: 'AUTOSAVE' };
    }
    if (this.isKeyword(directive, 'CONCURRENCY')) {
      return {
        kind: 'pragma',
        directive: 'CONCURRENCY',
        value: this.expectPositiveInteger('PRAGMA CONCURRENCY'),
      };
    }
    throw new ParseError(`unknown PRAGMA directive: ${directive.text}`, directive);
  }

  private parseBlock(): Block {
    this.advance();
    const statements: Statement[] = [];
    while (!this.isPunct(this.peek(), '}')) {
      if (this.isEOF()) {
        throw new ParseError('expected closing brace }');
      }
      statements.push(this.parseStatement());
    }
    this.advance();
    return { kind: 'block', statements };
  }

  /** `'[' name (',' name)* ']'` or a single name. */
  private parseNameList(
    context: string,
    options: { allowEmpty?: boolean } = {},
  ): string[] {
    if (!this.isPunct(this.peek(), '[')) {
      return [this.expectValue(`name after ${context}`)];
    }

    const open = this.advance();
    const names: string[] = [];
    while (!this.isPunct(this.peek(), ']')) {
      if (this.isEOF()) {
        throw new ParseError(`expected closing bracket ] in ${context}`);
      }
      if (names.length > 0) {
        const comma = this.peek();
        if (!this.isPunct(comma, ',')) {
          throw new ParseError(
            `expected ',' or ']' in ${context}, got ${describeToken(comma)}`,
            comma,
          );
        }
        this.advance();
      }
      names.push(this.expectValue(`name in ${context} list`));
    }
    this.advance();

    if (names.length === 0 && options.allowEmpty !== true) {
      throw new ParseError(`${context} requires at least one name`, open);
    }
    return names;
  }

  private expectValue(what: string): string {
    const token = this.peek();
    if (token === undefined) {
      throw new ParseError(`expected ${what}`);
    }
    if (token.kind === 'punct' || token.kind === 'operator') {
      throw new ParseError(`expected ${what}, got ${describeToken(token)}`, token);
    }
    this.advance();
    return token.value;
  }

  private expectPositiveInteger(context: string): number {
    const token = this.peek();
    if (token === undefined) {
      throw new ParseError(`expected value after ${context}`);
    }
    this.advance();
    if (token.kind === 'string' || !isSafeIntegerText(token.text)) {
      throw new ParseError(
        `expected integer value for ${context}, got ${describeToken(token)}`,
        token,
      );
    }
    const value = Number(token.text);
    if (value <= 0) {
      throw new ParseError(`${context} must be a positive integer, got ${value}`, token);
    }
    return value;
  }

  private expectDecimal(context: string): number {
    const token = this.peek();
    if (token === undefined) {
      throw new ParseError(`expected value after ${context}`);
    }
    this.advance();
    if (token.kind === 'string' || !DECIMAL.test(token.text)) {
      throw new ParseError(
        `expected numeric value for ${context}, got ${describeToken(token)}`,
        token,
      );
    }
    return Number(token.text);
  }

  private skipSemicolon(): void {
    if (this.isPunct(this.peek(), ';')) {
      this.advance();
    }
  }

  private peek(): Token | undefined {
    return this.tokens[this.cursor];
  }

  private previous(): Token | undefined {
    return this.tokens[this.cursor - 1];
  }

  private advance(): Token | undefined {
    const token = this.tokens[this.cursor];
    if (token !== undefined) {
      this.cursor += 1;
    }
    return token;
  }

  private isEOF(): boolean {
    return this.cursor >= this.tokens.length;
  }

  private isKeyword(token: Token | undefined, text: string): boolean {
    return token !== undefined && token.kind === 'keyword' && token.text === text;
  }

  private isPunct(token: Token | undefined, text: string): boolean {
    return token !== undefined && token.kind === 'punct' && token.text === text;
  }
}

const isSafeIntegerText = (text: string): boolean =>
  INTEGER.test(text) && Number.isSafeInteger(Number(text));

export const parse = (tokens: Token[]): Program =>
  new Parser(tokens).parseProgram();

export const parseSource = (source: string): Program => parse(tokenize(source));
