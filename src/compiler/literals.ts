import type { FilterCondition, FilterValue } from '../dsl/types.ts';

export const jsString = (value: string): string => JSON.stringify(value);

export const jsStringList = (values: string[]): string =>
  `[${values.map(jsString).join(', ')}]`;

export const jsFilterValue = (value: FilterValue): string =>
  value.kind === 'integer' ? String(value.value) : jsString(value.value);

export const jsFilter = (condition: FilterCondition): string =>
  `{ op: ${jsString(condition.operator)}, value: ${jsFilterValue(condition.value)} }`;

export const jsNullableString = (value: string | undefined): string =>
  value === undefined ? 'null' : jsString(value);

/** Single-line comment text; newlines would end the comment early. */
export const commentText = (value: string): string =>
  value.replace(/[\r\n]+/gu, ' ');
