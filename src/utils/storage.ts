import { readFile, writeFile, appendFile, readdir, rename, mkdir, access } from 'fs/promises';

/**
 * File system operations used by the pipeline. Ledger and output existence
 * checks all go through this seam so that runs can be replayed in memory.
 */
export interface Storage {
  list(dir: string): Promise<string[]>;
  exists(path: string): Promise<boolean>;
  readText(path: string): Promise<string>;
  writeText(path: string, content: string): Promise<void>;
  appendText(path: string, content: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  ensureDir(dir: string): Promise<void>;
}

export class FileStorage implements Storage {
  async list(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async readText(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  async writeText(path: string, content: string): Promise<void> {
    await writeFile(path, content, 'utf8');
  }

  async appendText(path: string, content: string): Promise<void> {
    await appendFile(path, content, 'utf8');
  }

  async rename(from: string, to: string): Promise<void> {
    await rename(from, to);
  }

  async ensureDir(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true });
  }
}
