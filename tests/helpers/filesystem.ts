import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

// File helpers the suites share for scratch directories and output checks

export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

export async function createTempDir(prefix = 'download-tracker-'): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), prefix));
}

export async function remove(path: string): Promise<void> {
  await fs.rm(path, { recursive: true, force: true });
}

export async function readFile(path: string): Promise<Buffer> {
  return fs.readFile(path);
}
