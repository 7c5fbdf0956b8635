export interface CompileOptions {
  /** Emit run-time debug logging for prompt definitions. */
  debug?: boolean;
}

/**
 * Mutable state of a single compile call. Created fresh by `compile` and
 * threaded through every lowering function.
 */
export interface CompileContext {
  readonly lines: string[];
  /** Dataset variables emitted so far (loaded and merged). */
  readonly datasets: Set<string>;
  /** `let` bindings already declared inside `main`. */
  readonly declared: Set<string>;
  /** Set by the first PRAGMA AUTOSAVE; affects only code emitted after it. */
  interruptHandling: boolean;
  readonly debug: boolean;
}

/** Where a statement is lowered: top level, or inside the FROM block of `datasetVar`. */
export type Scope =
  | { kind: 'top' }
  | { kind: 'dataset'; datasetVar: string };

export const TOP_SCOPE: Scope = { kind: 'top' };

export const createContext = (options: CompileOptions = {}): CompileContext => ({
  lines: [],
  datasets: new Set(),
  declared: new Set(),
  interruptHandling: false,
  debug: options.debug ?? false,
});

const INDENT = '  ';

export const emit = (ctx: CompileContext, line: string): void => {
  ctx.lines.push(line === '' ? '' : `${INDENT}${line}`);
};

/** `let name` the first time a binding is assigned, `name` afterwards. */
export const bind = (ctx: CompileContext, name: string): string => {
  if (ctx.declared.has(name)) {
    return name;
  }
  ctx.declared.add(name);
  return `let ${name}`;
};

/**
 * Turn a dataset name into an identifier fragment. `/`, `-` and `.` (and any
 * other character an identifier cannot hold, such as `²`) become `_`.
 */
export const sanitize = (name: string): string =>
  name.replace(/[^\p{ID_Continue}$]/gu, '_');

export const datasetVariable = (dataset: string): string =>
  `ds_${sanitize(dataset)}`;
