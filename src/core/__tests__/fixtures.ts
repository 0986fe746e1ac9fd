import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { gunzipSync, gzipSync } from 'zlib';
import type { Logger } from '../logging/logger.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'locobackup-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeText(root: string, relativePath: string, content: string): Promise<string> {
  const file = path.join(root, relativePath);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, 'utf-8');
  return file;
}

export async function writeJson(root: string, relativePath: string, data: unknown): Promise<string> {
  return writeText(root, relativePath, JSON.stringify(data));
}

export async function writeGzipJson(root: string, relativePath: string, data: unknown): Promise<string> {
  const file = path.join(root, relativePath);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, gzipSync(Buffer.from(JSON.stringify(data), 'utf-8')));
  return file;
}

export async function readJson(root: string, relativePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(path.join(root, relativePath), 'utf-8')) as unknown;
}

export async function readGzipJson(root: string, relativePath: string): Promise<unknown> {
  const compressed = await fs.readFile(path.join(root, relativePath));
  return JSON.parse(gunzipSync(compressed).toString('utf-8')) as unknown;
}

export async function exists(root: string, relativePath: string): Promise<boolean> {
  try {
    await fs.stat(path.join(root, relativePath));
    return true;
  } catch {
    return false;
  }
}

/** Every file under `root`, as sorted relative paths with forward slashes. */
export async function listTree(root: string): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else {
        found.push(path.relative(root, full).split(path.sep).join('/'));
      }
    }
  }

  await walk(root);
  return found.sort();
}

export interface RecordingLogger extends Logger {
  lines: Record<'debug' | 'info' | 'warn' | 'error', string[]>;
}

export function createRecordingLogger(): RecordingLogger {
  const lines: RecordingLogger['lines'] = { debug: [], info: [], warn: [], error: [] };
  return {
    lines,
    debug: (message) => lines.debug.push(message),
    info: (message) => lines.info.push(message),
    warn: (message) => lines.warn.push(message),
    error: (message) => lines.error.push(message),
  };
}

/** Naive instant for a wall-clock time, for building expected ranges. */
export function at(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): number {
  return Date.UTC(year, month - 1, day, hour, minute, second);
}
