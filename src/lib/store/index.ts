import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { StoreError } from './errors';
import { isValidProjectName, isValidSeconds, parseProjectsFile } from './parse';
import type {
  ProjectRecords,
  ProjectStore,
  ProjectStoreConfig,
  ProjectSummary,
  ProjectsFile,
} from './types';
import { CURRENT_FILE_VERSION } from './types';

export type {
  ProjectRecord,
  ProjectRecords,
  ProjectStore,
  ProjectStoreConfig,
  ProjectSummary,
  ProjectsFile,
} from './types';
export { StoreError, isStoreError } from './errors';
export type { StoreErrorCode } from './errors';

type ReadResult =
  | { ok: true; records: ProjectRecords }
  | { ok: false; reason: string; cause?: unknown };

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function byMostRecent(a: ProjectSummary, b: ProjectSummary): number {
  const at = a.updatedAt === null ? Number.NEGATIVE_INFINITY : Date.parse(a.updatedAt);
  const bt = b.updatedAt === null ? Number.NEGATIVE_INFINITY : Date.parse(b.updatedAt);
  if (at === bt) return 0;
  return bt > at ? 1 : -1;
}

/**
 * JSON-file store mapping project names to accumulated seconds.
 *
 * Every save re-reads the file, replaces one entry and writes the whole
 * mapping to `<file>.tmp` before renaming it over the original. Reads degrade
 * to an empty store; saves refuse to touch a file that exists but can't be
 * parsed.
 */
export function createProjectStore(config: ProjectStoreConfig): ProjectStore {
  const { filePath } = config;

  /** Read the file. A missing file is an empty store; anything else unusable is a failure. */
  function readFile(): ReadResult {
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
      if (errorCode(err) === 'ENOENT') return { ok: true, records: {} };
      return { ok: false, reason: 'could not be read', cause: err };
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err: unknown) {
      return { ok: false, reason: 'is not valid JSON', cause: err };
    }

    const records = parseProjectsFile(data);
    if (records === null) return { ok: false, reason: 'has an unknown layout' };
    return { ok: true, records };
  }

  function readAll(): ProjectRecords {
    const result = readFile();
    if (result.ok) return result.records;
    console.warn(`[store] Data file ${filePath} ${result.reason}, starting from zero`, result.cause ?? '');
    return {};
  }

  function load(projectId: string): number {
    return readAll()[projectId]?.seconds ?? 0;
  }

  function save(projectId: string, seconds: number, now: Date = new Date()): void {
    if (!isValidProjectName(projectId)) {
      throw new StoreError('INVALID_RECORD', 'Project name is required');
    }
    if (!isValidSeconds(seconds)) {
      throw new StoreError('INVALID_RECORD', `Invalid seconds for "${projectId}": ${seconds}`);
    }

    // Never replace a file we could not understand; it may still hold other totals.
    const current = readFile();
    if (!current.ok) {
      throw new StoreError('UNREADABLE', `Data file ${filePath} ${current.reason}; not overwriting it`, {
        cause: current.cause,
      });
    }

    const file: ProjectsFile = {
      version: CURRENT_FILE_VERSION,
      projects: {
        ...current.records,
        [projectId]: { seconds, updatedAt: now.toISOString() },
      },
    };

    const tmpPath = `${filePath}.tmp`;
    try {
      mkdirSync(dirname(filePath), { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(file, null, 2) + '\n', 'utf-8');
      renameSync(tmpPath, filePath);
    } catch (err: unknown) {
      throw new StoreError('WRITE_FAILED', `Could not write ${filePath}`, { cause: err });
    }
  }

  function list(): ProjectSummary[] {
    return Object.entries(readAll())
      .map(([name, record]) => ({ name, ...record }))
      .sort(byMostRecent);
  }

  function mostRecent(): string | null {
    return list()[0]?.name ?? null;
  }

  return { load, save, readAll, list, mostRecent };
}
