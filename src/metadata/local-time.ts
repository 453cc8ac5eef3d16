/**
 * Naive calendar values.
 *
 * Exif and IPTC timestamps carry no reliable timezone, so every timestamp
 * is handled as a wall-clock reading. `Date` objects from the record side
 * are read and built with local-time accessors.
 */

import { ExifDate, ExifDateTime, ExifTime } from 'exiftool-vendored';

import type { LocalDate, LocalDateTime, LocalTime, TagValue } from '../types/index.js';

export function isCalendarValue(
  value: TagValue | undefined
): value is LocalDateTime | LocalDate | LocalTime {
  return typeof value === 'object' && !Array.isArray(value);
}

export function localDateTime(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millisecond = 0
): LocalDateTime {
  return { kind: 'datetime', year, month, day, hour, minute, second, millisecond };
}

export function localDate(year: number, month: number, day: number): LocalDate {
  return { kind: 'date', year, month, day };
}

export function localTime(hour: number, minute: number, second: number): LocalTime {
  return { kind: 'time', hour, minute, second };
}

export function fromDate(date: Date): LocalDateTime {
  return localDateTime(
    date.getFullYear(),
    date.getMonth() + 1,
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds()
  );
}

export function toDate(value: LocalDateTime): Date {
  return new Date(
    value.year,
    value.month - 1,
    value.day,
    value.hour,
    value.minute,
    value.second,
    value.millisecond
  );
}

/**
 * Drops sub-second precision. Metadata timestamps only resolve to seconds.
 */
export function truncateToSeconds(value: LocalDateTime): LocalDateTime {
  return { ...value, millisecond: 0 };
}

export function combineDateAndTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return localDateTime(date.year, date.month, date.day, time.hour, time.minute, time.second);
}

export function splitDateTime(value: LocalDateTime): { date: LocalDate; time: LocalTime } {
  return {
    date: localDate(value.year, value.month, value.day),
    time: localTime(value.hour, value.minute, value.second)
  };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * ISO-like rendering, `2007-09-28T03:00:00` (milliseconds only when set)
 */
export function formatLocalDateTime(value: LocalDateTime): string {
  const base =
    `${pad(value.year, 4)}-${pad(value.month)}-${pad(value.day)}` +
    `T${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`;
  return value.millisecond > 0 ? `${base}.${pad(value.millisecond, 3)}` : base;
}

/**
 * Exif rendering, `2007:09:28 03:00:00`
 */
export function formatExifDateTime(value: LocalDateTime): string {
  return (
    `${pad(value.year, 4)}:${pad(value.month)}:${pad(value.day)} ` +
    `${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`
  );
}

export function formatExifDate(value: LocalDate): string {
  return `${pad(value.year, 4)}:${pad(value.month)}:${pad(value.day)}`;
}

export function formatExifTime(value: LocalTime): string {
  return `${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`;
}

/**
 * Parses an Exif or ISO date-time. Any offset is discarded; the wall-clock
 * reading is kept.
 */
export function parseExifDateTime(text: string): LocalDateTime | null {
  const parsed = ExifDateTime.fromEXIF(text.trim());
  if (!parsed) {
    return null;
  }
  return localDateTime(
    parsed.year,
    parsed.month,
    parsed.day,
    parsed.hour,
    parsed.minute,
    parsed.second,
    parsed.millisecond ?? 0
  );
}

export function parseExifDate(text: string): LocalDate | null {
  const parsed = ExifDate.fromEXIF(text.trim());
  return parsed ? localDate(parsed.year, parsed.month, parsed.day) : null;
}

export function parseExifTime(text: string): LocalTime | null {
  const parsed = ExifTime.fromEXIF(text.trim());
  return parsed ? localTime(parsed.hour, parsed.minute, Math.floor(parsed.second)) : null;
}
