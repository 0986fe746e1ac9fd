import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { gunzipSync } from 'zlib';
import {
  describeReadFailure,
  fileSize,
  isDirectory,
  isMissingPathError,
  pathExists,
  parseJson,
  readGzipJsonFile,
  readJsonFile,
  serializeJson,
  writeGzipJsonFile,
} from '../files.js';
import { makeTempDir, removeDir, writeText } from '../../__tests__/fixtures.js';

describe('stat helpers', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('report a missing path instead of throwing', async () => {
    const missing = path.join(root, 'nothing-here');

    expect(await pathExists(missing)).toBe(false);
    expect(await isDirectory(missing)).toBe(false);
    expect(await fileSize(missing)).toBeUndefined();
  });

  it('report a path below a regular file as missing', async () => {
    await writeText(root, 'file.json', '{}');
    const below = path.join(root, 'file.json', 'child');

    expect(await pathExists(below)).toBe(false);
    expect(await isDirectory(below)).toBe(false);
    expect(await fileSize(below)).toBeUndefined();
  });

  it('describe existing entries', async () => {
    await writeText(root, 'dir/file.json', '[1]');

    expect(await pathExists(path.join(root, 'dir'))).toBe(true);
    expect(await isDirectory(path.join(root, 'dir'))).toBe(true);
    expect(await isDirectory(path.join(root, 'dir', 'file.json'))).toBe(false);
    expect(await fileSize(path.join(root, 'dir', 'file.json'))).toBe(3);
  });
});

describe('isMissingPathError', () => {
  it('matches error-shaped objects by code', () => {
    expect(isMissingPathError({ code: 'ENOENT', message: 'gone' })).toBe(true);
    expect(isMissingPathError({ code: 'ENOTDIR', message: 'not a directory' })).toBe(true);
    expect(isMissingPathError({ code: 'EACCES', message: 'denied' })).toBe(false);
    expect(isMissingPathError(undefined)).toBe(false);
  });
});

describe('describeReadFailure', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('names corrupted gzip data by its zlib code', () => {
    expect(describeReadFailure({ code: 'Z_DATA_ERROR', message: 'incorrect header check' })).toBe(
      'Corrupted gzip data (incorrect header check)'
    );
  });

  it('names a real gzip failure', async () => {
    const file = await writeText(root, '2024-W50.json.gz', 'not gzip at all');

    const error = await readGzipJsonFile(file).then(
      () => undefined,
      (failure: unknown) => failure
    );

    expect(describeReadFailure(error)).toMatch(/^Corrupted gzip data \(/);
  });

  it('names a real JSON failure', async () => {
    const file = await writeText(root, 'broken.json', '{"id":');

    const error = await readJsonFile(file).then(
      () => undefined,
      (failure: unknown) => failure
    );

    expect(describeReadFailure(error)).toMatch(/^Invalid JSON \(/);
  });

  it('falls back to the message', () => {
    expect(describeReadFailure({ code: 'EACCES', message: 'permission denied' })).toBe('permission denied');
    expect(describeReadFailure('odd')).toBe('odd');
  });
});

describe('JSON numbers', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('reads safe numbers as plain numbers', () => {
    expect(parseJson('[{"id":"a","accuracy":12.25,"count":3}]')).toEqual([{ id: 'a', accuracy: 12.25, count: 3 }]);
  });

  it('keeps the digits of integers a double cannot hold', () => {
    expect(serializeJson(parseJson('{"big":12345678901234567890,"small":7}'))).toBe(
      '{"big":12345678901234567890,"small":7}'
    );
  });

  it('keeps large integers through a gzip rewrite', async () => {
    const source = await writeText(root, 'in.json', '[{"date":"2024-12-15T10:00:00Z","id":9007199254740993}]');
    const output = path.join(root, 'out', '2024-W50.json.gz');

    await writeGzipJsonFile(output, await readJsonFile(source));

    expect(gunzipSync(await fs.readFile(output)).toString('utf-8')).toBe(
      '[{"date":"2024-12-15T10:00:00Z","id":9007199254740993}]'
    );
  });
});
