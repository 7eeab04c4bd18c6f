import { dirname, join } from 'node:path';
import { DATA_FILE_NAME } from '../lib/config';

/** Path of the data file for a program at `programPath`. */
export function resolveDataFile(programPath: string): string {
  return join(dirname(programPath), DATA_FILE_NAME);
}
