/**
 * Parsing of `key=value` command-line assignments into config fields.
 *
 * Values are typed by their spelling:
 *   null            → null
 *   true / false    → boolean
 *   -12, 3.5        → number
 *   "quoted"        → the string inside the quotes (forces a string)
 *   anything else   → string, as written
 */

import type { ConfigValue } from '@meshconf/kernel';

export type AssignmentResult =
  | { readonly ok: true; readonly fields: Record<string, ConfigValue> }
  | { readonly ok: false; readonly error: string };

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;
const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;

export function parseConfigValue(text: string): ConfigValue {
  if (text === 'null') return null;
  if (text === 'true') return true;
  if (text === 'false') return false;
  if (NUMBER_PATTERN.test(text)) return Number(text);
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) return text.slice(1, -1);
  return text;
}

export function parseAssignments(items: ReadonlyArray<string>): AssignmentResult {
  const fields: Record<string, ConfigValue> = {};
  for (const item of items) {
    const eq = item.indexOf('=');
    if (eq <= 0) {
      return { ok: false, error: `expected key=value, got '${item}'` };
    }
    const key = item.slice(0, eq);
    if (!KEY_PATTERN.test(key)) {
      return { ok: false, error: `invalid field name '${key}'` };
    }
    if (Object.hasOwn(fields, key)) {
      return { ok: false, error: `field '${key}' given more than once` };
    }
    fields[key] = parseConfigValue(item.slice(eq + 1));
  }
  return { ok: true, fields };
}
