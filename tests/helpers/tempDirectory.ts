import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export async function withTempDirectory<T>(run: (directory: string) => Promise<T>): Promise<T> {
  const directory = await fs.mkdtemp(path.join(os.tmpdir(), 'slice-store-test-'));
  try {
    return await run(directory);
  } finally {
    await fs.rm(directory, { recursive: true, force: true });
  }
}

export async function listFileNames(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory);
  return entries.sort();
}
