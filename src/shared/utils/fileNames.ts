import fs from 'node:fs/promises';
import path from 'node:path';

export const compareNaturally = (left: string, right: string) =>
  left.localeCompare(right, undefined, { numeric: true, sensitivity: 'base' });

function isHidden(name: string) {
  return name.startsWith('.');
}

/** Regular, non-hidden files directly inside `directory`, naturally sorted. */
export async function listDirectoryFiles(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && !isHidden(entry.name))
    .map((entry) => entry.name)
    .sort(compareNaturally)
    .map((name) => path.join(directory, name));
}

/** Subdirectories of `directory`, naturally sorted. */
export async function listSubdirectories(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && !isHidden(entry.name))
    .map((entry) => entry.name)
    .sort(compareNaturally)
    .map((name) => path.join(directory, name));
}
