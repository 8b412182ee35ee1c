import * as fs from 'fs';
import * as path from 'path';

export const NMON_EXTENSION = '.nmon';

/** Regular *.nmon files directly inside dir, sorted by name. */
export async function listNmonFiles(dir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });

  return entries
    .filter(entry => entry.isFile() && entry.name.endsWith(NMON_EXTENSION))
    .map(entry => entry.name)
    .sort()
    .map(name => path.join(dir, name));
}
