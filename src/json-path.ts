import { EvaluationError } from './errors';
import type { JsonValue } from './types';

const INDEX = /^\d+$/;

export function isJsonObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSON type name of a value, as used in schema and error messages. */
export function jsonTypeOf(value: JsonValue | undefined): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Resolve a dot-separated path against a parsed body.
 * Numeric segments index arrays; an empty path is the root.
 */
export function resolvePath(root: JsonValue | undefined, path: string): JsonValue {
  if (root === undefined) {
    throw new EvaluationError('response body is not JSON');
  }
  if (path === '') return root;

  let current: JsonValue = root;
  const segments = path.split('.');
  for (let depth = 0; depth < segments.length; depth += 1) {
    const segment = segments[depth];
    const at = segments.slice(0, depth + 1).join('.');
    if (Array.isArray(current)) {
      if (!INDEX.test(segment)) {
        throw new EvaluationError(`path not found: '${at}' (cannot index array with '${segment}')`);
      }
      const index = Number(segment);
      if (index >= current.length) {
        throw new EvaluationError(`path not found: '${at}' (index ${index} out of range, length ${current.length})`);
      }
      current = current[index];
    } else if (isJsonObject(current)) {
      if (!Object.hasOwn(current, segment)) {
        throw new EvaluationError(`path not found: '${at}'`);
      }
      current = current[segment];
    } else {
      throw new EvaluationError(`path not found: '${at}' (cannot descend into ${jsonTypeOf(current)})`);
    }
  }
  return current;
}
