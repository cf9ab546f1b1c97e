import { afterEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Logger, ValidationError } from '@callbridge/core';
import { EXIT_ERROR, EXIT_PARTIAL, parseJobTypeRef, recordsFromJson, runCli } from '../src/commands.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

function harness() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const logs: string[] = [];
  return {
    stdout,
    stderr,
    logs,
    options: {
      io: { stdout: (text: string) => stdout.push(text), stderr: (text: string) => stderr.push(text) },
      logger: new Logger({ level: 'debug', sink: (line) => logs.push(line) }),
    },
  };
}

describe('runCli', () => {
  it('prints usage for unknown commands', async () => {
    const h = harness();

    await expect(runCli(['migrate'], h.options)).resolves.toBe(EXIT_ERROR);
    expect(h.stderr[0]?.startsWith('Usage:\n  callbridge list')).toBe(true);
  });

  it('lists platform pairs and job types', async () => {
    const h = harness();

    await expect(runCli(['list'], h.options)).resolves.toBe(0);
    expect(h.stdout[0]).toBe('ringcentral -> zoom');
    expect(h.stdout[1]).toBe('  rc_zoom_sites (33) site: RingCentral Sites to Zoom Sites');
    expect(h.stdout).toContain('dialpad -> zoom');
  });

  it('writes transformed records to the output file', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'callbridge-cli-'));
    mkdirSync(join(tmpDir, 'configs'));
    writeFileSync(join(tmpDir, 'configs', 'rc_zoom_sites.yaml'), 'ar_name_suffix: " - AR"\n');
    writeFileSync(
      join(tmpDir, 'config.json'),
      JSON.stringify({ logging: { level: 'warn' }, transformations: { directory: 'configs' } })
    );
    writeFileSync(join(tmpDir, 'sites.json'), JSON.stringify([{ id: 's1', name: 'Main Office' }]));
    const outputPath = join(tmpDir, 'out.json');
    const h = harness();

    const code = await runCli(
      [
        'transform',
        '--source', 'ringcentral',
        '--target', 'zoom',
        '--job', 'rc_zoom_sites',
        '--input', join(tmpDir, 'sites.json'),
        '--output', outputPath,
        '--config', join(tmpDir, 'config.json'),
      ],
      h.options
    );

    expect(code).toBe(0);
    expect(h.stdout).toEqual([]);
    expect(JSON.parse(readFileSync(outputPath, 'utf-8'))).toEqual({
      jobType: 'rc_zoom_sites',
      records: [
        { id: 's1', name: 'Main Office', site_code: 'MAIN_OFFICE', auto_receptionist_name: 'Main Office - AR' },
      ],
      failures: [],
    });
  });

  it('prints results and per-record failures', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'callbridge-cli-'));
    const inputPath = join(tmpDir, 'sites.json');
    writeFileSync(inputPath, JSON.stringify({ records: [{ id: 's1', name: 'Main Office' }, { name: 'Annex' }] }));
    const h = harness();

    const code = await runCli(
      ['transform', '--source', 'ringcentral', '--target', 'zoom', '--job', '33', '--input', inputPath],
      h.options
    );

    expect(code).toBe(EXIT_PARTIAL);
    const printed: unknown = JSON.parse(h.stdout[0] ?? '');
    expect(printed).toEqual({
      jobType: 'rc_zoom_sites',
      records: [
        { id: 's1', name: 'Main Office', site_code: 'MAIN_OFFICE', auto_receptionist_name: 'Main Office (NIU)' },
      ],
      failures: [
        {
          index: 1,
          code: 'VALIDATION_ERROR',
          message: 'Input for rc_zoom_sites is missing required fields: id',
          missingFields: ['id'],
        },
      ],
    });
    expect(h.stderr).toEqual(['record 1: [VALIDATION_ERROR] Input for rc_zoom_sites is missing required fields: id']);
  });

  it('requires every transform option', async () => {
    const h = harness();

    await expect(runCli(['transform', '--source', 'ringcentral', '--job'], h.options)).resolves.toBe(EXIT_ERROR);
    expect(h.stderr[0]).toBe('transform requires --source, --target, --job and --input');
  });

  it('reports config errors with their code', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'callbridge-cli-'));
    writeFileSync(join(tmpDir, 'config.json'), JSON.stringify({ logging: { level: 'loud' } }));
    const h = harness();

    await expect(runCli(['list', '--config', join(tmpDir, 'config.json')], h.options)).resolves.toBe(EXIT_ERROR);
    expect(h.stderr[0]?.startsWith('Error [CONFIGURATION_ERROR]: Invalid config:\n- logging.level:')).toBe(true);
  });
});

describe('input helpers', () => {
  it('reads job types as ids or codes', () => {
    expect(parseJobTypeRef('78')).toBe(78);
    expect(parseJobTypeRef('rc_zoom_ivr')).toBe('rc_zoom_ivr');
  });

  it('accepts arrays, record envelopes and single records', () => {
    expect(recordsFromJson([{ id: 1 }])).toEqual([{ id: 1 }]);
    expect(recordsFromJson({ records: [{ id: 2 }] })).toEqual([{ id: 2 }]);
    expect(recordsFromJson({ id: 3 })).toEqual([{ id: 3 }]);
    expect(() => recordsFromJson('sites')).toThrow(ValidationError);
  });
});
