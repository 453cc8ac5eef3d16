/**
 * Value normalization
 *
 * Every comparison between a record value and a tag value goes through
 * {@link normalize} on both sides:
 * - zero-length strings and lists count as "no value"
 * - lists become unordered sets, so reordering is never a difference
 * - scalars stay scalars
 */

import type { FieldValue, SemanticValue } from '../types/index.js';

import { formatLocalDateTime } from './local-time.js';

export const ABSENT: SemanticValue = { kind: 'absent' };

export function isTextSet(value: FieldValue): value is ReadonlySet<string> {
  return value instanceof Set;
}

function isStringCollection(value: FieldValue): value is readonly string[] | ReadonlySet<string> {
  return Array.isArray(value) || isTextSet(value);
}

export function normalize(value: FieldValue): SemanticValue {
  if (value === null || value === undefined) {
    return ABSENT;
  }
  if (typeof value === 'string') {
    return value.length === 0 ? ABSENT : { kind: 'text', value };
  }
  if (typeof value === 'number') {
    return { kind: 'integer', value };
  }
  if (isStringCollection(value)) {
    const values = new Set(value);
    return values.size === 0 ? ABSENT : { kind: 'text-set', values };
  }
  switch (value.kind) {
    case 'datetime':
      return { kind: 'datetime', value };
    case 'date':
      return { kind: 'date', value };
    case 'time':
      return { kind: 'time', value };
  }
}

export function isAbsent(value: FieldValue): boolean {
  return normalize(value).kind === 'absent';
}

function setsEqual(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const item of a) {
    if (!b.has(item)) {
      return false;
    }
  }
  return true;
}

export function semanticEquals(a: SemanticValue, b: SemanticValue): boolean {
  switch (a.kind) {
    case 'absent':
      return b.kind === 'absent';
    case 'text':
      return b.kind === 'text' && a.value === b.value;
    case 'integer':
      return b.kind === 'integer' && a.value === b.value;
    case 'datetime':
      return b.kind === 'datetime' && formatLocalDateTime(a.value) === formatLocalDateTime(b.value);
    case 'date':
      return (
        b.kind === 'date' &&
        a.value.year === b.value.year &&
        a.value.month === b.value.month &&
        a.value.day === b.value.day
      );
    case 'time':
      return (
        b.kind === 'time' &&
        a.value.hour === b.value.hour &&
        a.value.minute === b.value.minute &&
        a.value.second === b.value.second
      );
    case 'text-set':
      return b.kind === 'text-set' && setsEqual(a.values, b.values);
  }
}

/**
 * Normalizes both sides and compares them.
 */
export function valuesMatch(a: FieldValue, b: FieldValue): boolean {
  return semanticEquals(normalize(a), normalize(b));
}
