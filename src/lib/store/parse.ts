import type { ProjectRecord, ProjectRecords } from './types';
import { CURRENT_FILE_VERSION } from './types';

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isValidSeconds(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

export function isValidProjectName(name: string): boolean {
  return name.trim().length > 0;
}

function parseTimestamp(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : value;
}

// ---------------------------------------------------------------------------
// Current layout: { version: 1, projects: { name: { seconds, updatedAt } } }
// ---------------------------------------------------------------------------

function parseRecord(value: unknown): ProjectRecord | null {
  if (!isObject(value) || !isValidSeconds(value.seconds)) return null;
  return { seconds: value.seconds, updatedAt: parseTimestamp(value.updatedAt) };
}

function parseVersioned(projects: Record<string, unknown>): ProjectRecords {
  const records: [string, ProjectRecord][] = [];
  for (const [name, value] of Object.entries(projects)) {
    if (!isValidProjectName(name)) continue;
    const record = parseRecord(value);
    if (record) records.push([name, record]);
  }
  return Object.fromEntries(records);
}

// ---------------------------------------------------------------------------
// Legacy layout: { name: { "<iso date>": hours, ... } }
// ---------------------------------------------------------------------------

/**
 * Sum a legacy per-date hours map into seconds. Dates that don't parse and
 * hour values that aren't non-negative numbers are skipped.
 */
function parseLegacyRecord(entries: Record<string, unknown>): ProjectRecord {
  let hours = 0;
  let latest: string | null = null;
  for (const [date, value] of Object.entries(entries)) {
    if (parseTimestamp(date) === null || !isValidSeconds(value)) continue;
    hours += value;
    if (latest === null || Date.parse(date) > Date.parse(latest)) latest = date;
  }
  return { seconds: Math.round(hours * 3600), updatedAt: latest };
}

function parseLegacy(data: Record<string, unknown>): ProjectRecords {
  const records: [string, ProjectRecord][] = [];
  for (const [name, value] of Object.entries(data)) {
    if (!isValidProjectName(name) || !isObject(value)) continue;
    records.push([name, parseLegacyRecord(value)]);
  }
  return Object.fromEntries(records);
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Validate parsed JSON into project records, skipping malformed entries.
 * Returns null when the document is not a layout this store knows, such as an
 * array or a file written with a newer `version`.
 */
export function parseProjectsFile(data: unknown): ProjectRecords | null {
  if (!isObject(data)) return null;
  if (data.version === CURRENT_FILE_VERSION) {
    return isObject(data.projects) ? parseVersioned(data.projects) : null;
  }
  // Legacy project entries are objects; a scalar `version` is a layout we don't know.
  if ('version' in data && !isObject(data.version)) return null;
  return parseLegacy(data);
}
