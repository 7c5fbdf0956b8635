export type TokenKind = 'keyword' | 'word' | 'string' | 'operator' | 'punct';

export interface Token {
  kind: TokenKind;
  /** Source text of the token, quotes included for strings. */
  text: string;
  /** Text with surrounding quotes removed. */
  value: string;
  line: number;
  column: number;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  'FROM',
  'WITH',
  'FIELDS',
  'USING',
  'FILTER',
  'MODEL',
  'KEY',
  'URL',
  'MERGE',
  'SAVE',
  'GENERATE',
  'PROMPT',
  'SYSTEM',
  'USER',
  'TOKENS',
  'TEMPERATURE',
  'PRAGMA',
  'AUTOSAVE',
  'CONCURRENCY',
  'STREAM',
  'AS',
  'TO',
]);

const PUNCT = new Set(['{', '}', '[', ']', ',', ';']);
const WORD_CHAR = /^[\p{L}\p{N}_./-]$/u;

export class TokenizeError extends Error {
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(message: string, line?: number, column?: number) {
    super(
      line !== undefined && column !== undefined
        ? `Tokenize error at line ${line}, column ${column}: ${message}`
        : `Tokenize error: ${message}`,
    );
    this.name = 'TokenizeError';
    this.line = line;
    this.column = column;
  }
}

export const stripQuotes = (s: string): string => {
  if (
    s.length >= 2 &&
    ((s.startsWith('"') && s.endsWith('"')) ||
      (s.startsWith("'") && s.endsWith("'")))
  ) {
    return s.slice(1, -1);
  }
  return s;
};

const isWordChar = (ch: string): boolean => WORD_CHAR.test(ch);

/**
 * Split DSL source into tokens. Comments run from `#` to the end of the line;
 * quoted strings are read whole so their contents never become tokens.
 */
export const tokenize = (input: string): Token[] => {
  const tokens: Token[] = [];
  let i = 0;
  let line = 1;
  let column = 1;

  const advance = (count: number): void => {
    for (let k = 0; k < count; k += 1) {
      if (input[i] === '\n') {
        line += 1;
        column = 1;
      } else {
        column += 1;
      }
      i += 1;
    }
  };

  const push = (kind: TokenKind, text: string, startLine: number, startColumn: number): void => {
    tokens.push({
      kind,
      text,
      value: kind === 'string' ? stripQuotes(text) : text,
      line: startLine,
      column: startColumn,
    });
  };

  while (i < input.length) {
    const ch = input[i] ?? '';
    const startLine = line;
    const startColumn = column;

    if (/\s/u.test(ch)) {
      advance(1);
      continue;
    }

    if (ch === '#') {
      while (i < input.length && input[i] !== '\n') {
        advance(1);
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      const end = input.indexOf(ch, i + 1);
      if (end < 0) {
        throw new TokenizeError('unterminated string', startLine, startColumn);
      }
      const text = input.slice(i, end + 1);
      advance(text.length);
      push('string', text, startLine, startColumn);
      continue;
    }

    const pair = input.slice(i, i + 2);
    if (pair === '>=' || pair === '<=' || pair === '!=') {
      advance(2);
      push('operator', pair, startLine, startColumn);
      continue;
    }

    if (ch === '=' || ch === '>' || ch === '<') {
      advance(1);
      push('operator', ch, startLine, startColumn);
      continue;
    }

    if (PUNCT.has(ch)) {
      advance(1);
      push('punct', ch, startLine, startColumn);
      continue;
    }

    if (isWordChar(ch)) {
      let end = i;
      while (end < input.length && isWordChar(input[end] ?? '')) {
        end += 1;
      }
      const text = input.slice(i, end);
      advance(text.length);
      push(KEYWORDS.has(text) ? 'keyword' : 'word', text, startLine, startColumn);
      continue;
    }

    throw new TokenizeError(
      `unexpected character ${JSON.stringify(ch)}`,
      startLine,
      startColumn,
    );
  }

  if (tokens.length === 0) {
    throw new TokenizeError('no recognizable tokens found');
  }

  return tokens;
};
