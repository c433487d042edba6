/**
 * Shared utility functions used across gitbrief packages.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { nanoid } from 'nanoid';

/** Generate a unique ID */
export function generateId(): string {
  return nanoid();
}

/** Get the current ISO timestamp */
export function now(): string {
  return new Date().toISOString();
}

/** Read a file safely, returning null if it doesn't exist */
export function readFileSafe(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
}

/** Write through a sibling temp file and rename, so readers never see a partial file */
export function atomicWrite(filePath: string, data: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, data, 'utf-8');
  fs.renameSync(tmp, filePath);
}

/** Sleep for a given number of milliseconds; resolves early when the signal aborts */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

interface ClockParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const zoneFormats = new Map<string, Intl.DateTimeFormat>();

/** Wall-clock fields of `date` in `timeZone` (an IANA name), or in local time when omitted */
function clockParts(date: Date, timeZone?: string): ClockParts {
  if (!timeZone) {
    return {
      year: date.getFullYear(),
      month: date.getMonth() + 1,
      day: date.getDate(),
      hour: date.getHours(),
      minute: date.getMinutes(),
      second: date.getSeconds(),
    };
  }

  let format = zoneFormats.get(timeZone);
  if (!format) {
    format = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
    });
    zoneFormats.set(timeZone, format);
  }

  const parts: Partial<Record<Intl.DateTimeFormatPartTypes, number>> = {};
  for (const part of format.formatToParts(date)) {
    if (part.type !== 'literal') parts[part.type] = Number(part.value);
  }
  return {
    year: parts.year ?? 0,
    month: parts.month ?? 0,
    day: parts.day ?? 0,
    hour: parts.hour ?? 0,
    minute: parts.minute ?? 0,
    second: parts.second ?? 0,
  };
}

/** Calendar date, YYYY-MM-DD */
export function formatDate(date: Date, timeZone?: string): string {
  const p = clockParts(date, timeZone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)}`;
}

/** Date stamp for file names, YYYYMMDD */
export function dateStamp(date: Date, timeZone?: string): string {
  return formatDate(date, timeZone).replace(/-/g, '');
}

/** Timestamp for file names, YYYYMMDD_HHMMSS */
export function timestampStamp(date: Date, timeZone?: string): string {
  const p = clockParts(date, timeZone);
  return `${dateStamp(date, timeZone)}_${pad(p.hour)}${pad(p.minute)}${pad(p.second)}`;
}

/** Time for report headers, YYYY-MM-DD HH:MM:SS */
export function formatDateTime(date: Date, timeZone?: string): string {
  const p = clockParts(date, timeZone);
  return `${formatDate(date, timeZone)} ${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}`;
}

/** True for http(s) and scp-style git URLs */
export function isRemoteLocation(location: string): boolean {
  return /^(https?:\/\/|git@)/.test(location);
}
