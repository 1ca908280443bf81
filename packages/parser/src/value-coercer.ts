import { Cell, FieldMap, FieldValue } from './types.js';

const DIGITS_RE = /^\d+$/;

export const ABSENT: Cell = { kind: 'absent' };

/**
 * Convert a trimmed token into a typed value.
 *
 * - all decimal digits → integer (`"045"` → 45), or text when the value
 *   exceeds `Number.MAX_SAFE_INTEGER`
 * - `true` / `false` (any case) → boolean
 * - anything else → text, unchanged
 */
export function coerceValue(token: string): FieldValue {
  if (DIGITS_RE.test(token)) {
    const value = parseInt(token, 10);
    if (Number.isSafeInteger(value)) return { kind: 'integer', value };
    return { kind: 'text', value: token };
  }
  const lower = token.toLowerCase();
  if (lower === 'true' || lower === 'false') {
    return { kind: 'boolean', value: lower === 'true' };
  }
  return { kind: 'text', value: token };
}

/** Field names carrying temperature telemetry, e.g. `temperature`, `PhoneTemp`. */
export function isTemperatureKey(key: string): boolean {
  return key.toLowerCase().includes('temp');
}

/** Raw temperature telemetry is reported in tenths of a degree: 235 → 23.5. */
export function scaleTenths(value: FieldValue): FieldValue {
  if (value.kind !== 'integer') return value;
  return { kind: 'float', value: value.value / 10 };
}

export function getField(map: FieldMap, key: string): Cell {
  return Object.prototype.hasOwnProperty.call(map, key) ? map[key] : ABSENT;
}

/** Wrap an optional scalar as a Cell. */
export function toCell(value: number | string | boolean | undefined, numeric: 'integer' | 'float' = 'float'): Cell {
  if (value === undefined) return ABSENT;
  if (typeof value === 'string') return { kind: 'text', value };
  if (typeof value === 'boolean') return { kind: 'boolean', value };
  return { kind: numeric, value };
}
