import * as fs from 'fs/promises';
import * as path from 'path';
import { promisify } from 'util';
import { gunzip, gzip } from 'zlib';
import { LosslessNumber, isSafeNumber, parse, stringify } from 'lossless-json';
import { describeError, errorCode } from '../errors.js';

const gunzipAsync = promisify(gunzip);
const gzipAsync = promisify(gzip);

export function isMissingPathError(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch (error) {
    if (isMissingPathError(error)) return false;
    throw error;
  }
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (error) {
    if (isMissingPathError(error)) return false;
    throw error;
  }
}

/** Size in bytes, or `undefined` when nothing is at the path. */
export async function fileSize(target: string): Promise<number | undefined> {
  try {
    return (await fs.stat(target)).size;
  } catch (error) {
    if (isMissingPathError(error)) return undefined;
    throw error;
  }
}

export async function listDirectories(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

export async function listFiles(dir: string, suffix: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(suffix))
    .map((entry) => entry.name)
    .sort();
}

/** Numbers a double cannot hold exactly stay `LosslessNumber`s and are written back digit for digit. */
function parseNumber(value: string): number | LosslessNumber {
  return isSafeNumber(value) ? parseFloat(value) : new LosslessNumber(value);
}

export function parseJson(content: string): unknown {
  return parse(content, null, parseNumber);
}

export function serializeJson(data: unknown, indent?: number): string {
  const text = stringify(data, undefined, indent);
  if (text === undefined) {
    throw new TypeError('Value cannot be written as JSON');
  }
  return text;
}

export async function readJsonFile(file: string): Promise<unknown> {
  const content = await fs.readFile(file, 'utf-8');
  return parseJson(content);
}

export async function readGzipJsonFile(file: string): Promise<unknown> {
  const compressed = await fs.readFile(file);
  const content = await gunzipAsync(compressed);
  return parseJson(content.toString('utf-8'));
}

export async function writeJsonFile(file: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, serializeJson(data, 2), 'utf-8');
}

export async function writeGzipJsonFile(file: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, await gzipAsync(Buffer.from(serializeJson(data), 'utf-8')));
}

/** Byte-for-byte copy that keeps the source's access and modification times. */
export async function copyFileVerbatim(source: string, destination: string): Promise<void> {
  await fs.mkdir(path.dirname(destination), { recursive: true });
  await fs.copyFile(source, destination);
  const stats = await fs.stat(source);
  await fs.utimes(destination, stats.atime, stats.mtime);
}

/** Short reason for a file that could not be read. */
export function describeReadFailure(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'name' in error && error.name === 'SyntaxError') {
    return `Invalid JSON (${describeError(error)})`;
  }
  if (errorCode(error)?.startsWith('Z_')) {
    return `Corrupted gzip data (${describeError(error)})`;
  }
  return describeError(error);
}
