import { MalformedResultError } from './errors.js';
import type { JsonObject, JsonValue } from './types.js';

interface Violation {
  path: string;
  reason: string;
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function findViolation(value: unknown, path: string, ancestors: object[]): Violation | null {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return null;
    case 'number':
      return Number.isFinite(value) ? null : { path, reason: `non-finite number ${value}` };
    case 'undefined':
    case 'function':
    case 'symbol':
    case 'bigint':
      return { path, reason: `${typeof value} is not a JSON value` };
  }

  if (value === null) return null;
  if (typeof value !== 'object') return { path, reason: 'unsupported value' };

  if (ancestors.includes(value)) {
    return { path, reason: 'circular reference' };
  }

  if (Array.isArray(value)) {
    ancestors.push(value);
    for (let i = 0; i < value.length; i++) {
      if (!(i in value)) return { path: `${path}[${i}]`, reason: 'sparse array hole' };
      const found = findViolation(value[i], `${path}[${i}]`, ancestors);
      if (found) return found;
    }
    ancestors.pop();
    return null;
  }

  if (!isPlainObject(value)) {
    const name = value.constructor?.name ?? 'object';
    return { path, reason: `${name} instance is not a plain object` };
  }
  if (Object.getOwnPropertySymbols(value).length > 0) {
    return { path, reason: 'symbol keys are not allowed' };
  }

  ancestors.push(value);
  for (const [key, child] of Object.entries(value)) {
    const found = findViolation(child, `${path}.${key}`, ancestors);
    if (found) return found;
  }
  ancestors.pop();
  return null;
}

export function isJsonValue(value: unknown): value is JsonValue {
  return findViolation(value, '$', []) === null;
}

export function assertJsonValue(value: unknown, label = 'result'): asserts value is JsonValue {
  const violation = findViolation(value, label, []);
  if (violation) {
    throw new MalformedResultError(violation.path, violation.reason);
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

/** Detached, frozen copy: later edits to the caller's object never reach the store. */
export function freezeCopy<T extends JsonValue>(value: T): T {
  return deepFreeze(structuredClone(value));
}
