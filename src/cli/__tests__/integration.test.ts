import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as path from 'path';
import { Command } from 'commander';
import { buildProgram, runCli } from '../index.js';
import {
  listTree,
  makeTempDir,
  removeDir,
  writeGzipJson,
  writeJson,
} from '../../core/__tests__/fixtures.js';

function quietProgram(): Command {
  return buildProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
}

describe('CLI Integration Tests', () => {
  let root: string;
  let exitSpy: jest.SpiedFunction<typeof process.exit>;
  let errorSpy: jest.SpiedFunction<typeof console.error>;
  let logSpy: jest.SpiedFunction<typeof console.log>;

  beforeEach(async () => {
    root = await makeTempDir();
    exitSpy = jest.spyOn(process, 'exit').mockImplementation((() => undefined) as never);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(root);
  });

  it('should show the range options in help', () => {
    const help = buildProgram().helpInformation();
    expect(help).toContain('--backup-dir <dir>');
    expect(help).toContain('--start <datetime>');
    expect(help).toContain('--date <day>');
    expect(help).toContain('--days <n>');
  });

  it('runs parseAsync via runCli with provided argv', async () => {
    const parseSpy = jest.spyOn(Command.prototype, 'parseAsync').mockResolvedValue(new Command());

    await runCli(['node', 'locobackup-filter', '--help']);

    expect(parseSpy).toHaveBeenCalledWith(['node', 'locobackup-filter', '--help']);
  });

  it('filters a backup and prints the summary as JSON', async () => {
    const backupDir = path.join(root, 'backup');
    const outputDir = path.join(root, 'filtered');
    await writeJson(backupDir, 'TimelineItem/0A/visit.json', {
      startDate: '2024-12-25 09:00:00',
      endDate: '2024-12-25 10:00:00',
      isVisit: true,
      placeId: 'HOME',
    });
    await writeGzipJson(backupDir, 'LocomotionSample/2024-W52.json.gz', [
      { date: '2024-12-25T09:15:00Z' },
      { date: '2024-12-26T09:15:00Z' },
    ]);
    await writeJson(backupDir, 'Place/H/HOME.json', { id: 'HOME' });

    await quietProgram().parseAsync([
      'node',
      'locobackup-filter',
      '--backup-dir',
      backupDir,
      '--output-dir',
      outputDir,
      '--date',
      '2024-12-25',
      '--json',
    ]);

    expect(exitSpy).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledTimes(1);
    const summary = JSON.parse(String(logSpy.mock.calls[0][0])) as Record<string, unknown>;
    expect(summary).toMatchObject({
      layout: 'v1',
      range: { start: '2024-12-25 00:00:00', end: '2024-12-25 23:59:59' },
      items: 1,
      samples: 1,
      places: 1,
    });
    expect(await listTree(outputDir)).toEqual([
      'LocomotionSample/2024-W52.json.gz',
      'Place/H/HOME.json',
      'TimelineItem/0A/visit.json',
    ]);
  });

  it('should exit with an error when --start has no --end', async () => {
    await quietProgram().parseAsync([
      'node',
      'locobackup-filter',
      '--backup-dir',
      root,
      '--start',
      '2024-12-15 00:00:00',
    ]);

    expect(errorSpy).toHaveBeenCalledWith('Error:', '--end is required when using --start');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('should exit with an error for an unrecognised backup', async () => {
    await quietProgram().parseAsync(['node', 'locobackup-filter', '--backup-dir', root, '--days', '3']);

    expect(errorSpy).toHaveBeenCalledWith('Error:', `Unrecognized backup format: ${root}`);
    expect(errorSpy).toHaveBeenCalledWith(
      'Hint:',
      'Expected TimelineItem + LocomotionSample or items + samples directories'
    );
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('rejects two range modes at once', async () => {
    await expect(
      quietProgram().parseAsync([
        'node',
        'locobackup-filter',
        '--backup-dir',
        root,
        '--date',
        '2024-12-25',
        '--days',
        '2',
      ])
    ).rejects.toMatchObject({ code: 'commander.conflictingOption' });
  });

  it('requires --backup-dir', async () => {
    await expect(
      quietProgram().parseAsync(['node', 'locobackup-filter', '--date', '2024-12-25'])
    ).rejects.toMatchObject({ code: 'commander.missingMandatoryOptionValue' });
  });

  it('rejects a non-numeric --days', async () => {
    await expect(
      quietProgram().parseAsync(['node', 'locobackup-filter', '--backup-dir', root, '--days', 'week'])
    ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
  });
});
