import { isJsonObject } from './json-value.js';
import type { JsonPrimitive, JsonValue } from './types.js';

export function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ').trim();
}

export function table(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = [
    `| ${headers.map(escapeCell).join(' | ')} |`,
    `| ${headers.map(() => '---').join(' | ')} |`,
    ...rows.map(row => `| ${row.map(escapeCell).join(' | ')} |`)
  ];
  return lines.join('\n');
}

export function bulletList(items: readonly string[], placeholder: string): string {
  if (items.length === 0) return `- ${placeholder}`;
  return items.map(item => `- ${item}`).join('\n');
}

/** `problem_solution_fit` -> `Problem Solution Fit` */
export function humanize(key: string): string {
  return key
    .split(/[_\s]+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function formatPrimitive(value: JsonPrimitive): string {
  if (value === null) return 'n/a';
  if (typeof value === 'boolean') return value ? 'yes' : 'no';
  return String(value);
}

/** Nested bullet rendering of a JSON value under a label. */
export function renderField(label: string, value: JsonValue, depth = 0): string[] {
  const indent = '  '.repeat(depth);

  if (Array.isArray(value)) {
    if (value.length === 0) return [`${indent}- ${label}: none`];
    return [
      `${indent}- ${label}:`,
      ...value.flatMap((item, i) =>
        isJsonObject(item) || Array.isArray(item)
          ? renderField(`Item ${i + 1}`, item, depth + 1)
          : [`${indent}  - ${formatPrimitive(item)}`]
      )
    ];
  }

  if (isJsonObject(value)) {
    const entries = Object.entries(value);
    if (entries.length === 0) return [`${indent}- ${label}: none`];
    return [
      `${indent}- ${label}:`,
      ...entries.flatMap(([key, child]) => renderField(humanize(key), child, depth + 1))
    ];
  }

  return [`${indent}- ${label}: ${formatPrimitive(value)}`];
}
