/** Accumulated time for one project. */
export interface ProjectRecord {
  /** Seconds banked across all completed sessions. Finite and >= 0. */
  seconds: number;
  /** ISO 8601 time of the last save, or null if unknown. */
  updatedAt: string | null;
}

/** Project name -> record. */
export type ProjectRecords = Record<string, ProjectRecord>;

/** On-disk layout. Rewritten wholesale on every save. */
export interface ProjectsFile {
  version: 1;
  projects: ProjectRecords;
}

/** A project as shown in pickers, most recently updated first. */
export interface ProjectSummary extends ProjectRecord {
  name: string;
}

export interface ProjectStoreConfig {
  /** Path to the JSON data file. */
  filePath: string;
}

export interface ProjectStore {
  /** Stored seconds for `projectId`, or 0. Never throws. */
  load(projectId: string): number;
  /** Read-modify-write of the whole mapping. Throws StoreError. */
  save(projectId: string, seconds: number, now?: Date): void;
  /** Every valid record. Never throws. */
  readAll(): ProjectRecords;
  list(): ProjectSummary[];
  /** Most recently updated project, or null when the store is empty. */
  mostRecent(): string | null;
}

export const CURRENT_FILE_VERSION = 1;
