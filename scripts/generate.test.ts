import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../utils/errors';
import { formatBounds, loadParameters, namedParts, parseArgs, type GenerateOptions } from './generate';

const defaults: GenerateOptions = { outDir: 'things', left: false, preview: false, zip: false, summary: false };

describe('parseArgs', () => {
  it('defaults to writing the right half into things/', () => {
    expect(parseArgs([])).toEqual(defaults);
  });

  it('reads every option', () => {
    expect(
      parseArgs(['--config', 'case.json', '--out', 'dist/stl', '--style', 'fixed', '--left', '--preview', '--zip', '--summary'])
    ).toEqual({
      configPath: 'case.json',
      outDir: 'dist/stl',
      style: 'fixed',
      left: true,
      preview: true,
      zip: true,
      summary: true,
    });
  });

  it('rejects bad input', () => {
    expect(() => parseArgs(['--style', 'curved'])).toThrow(
      '--style must be one of standard, orthographic, fixed, got "curved"'
    );
    expect(() => parseArgs(['--out'])).toThrow('--out needs a value');
    expect(() => parseArgs(['--config', '--left'])).toThrow('--config needs a value');
    expect(() => parseArgs(['--right'])).toThrow('unknown option: --right');
  });
});

describe('loadParameters', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  const writeConfig = (contents: unknown): string => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ergoshell-'));
    const file = path.join(dir, 'case.json');
    fs.writeFileSync(file, JSON.stringify(contents));
    return file;
  };

  it('uses the defaults without a config file', () => {
    expect(loadParameters(defaults).columnStyle).toBe('standard');
  });

  it('applies the style flag over the config file', () => {
    const params = loadParameters({ ...defaults, configPath: writeConfig({ nrows: 6, columnStyle: 'fixed' }), style: 'orthographic' });
    expect(params.nrows).toBe(6);
    expect(params.centerRow).toBe(3);
    expect(params.columnStyle).toBe('orthographic');
  });

  it('rejects an invalid config file', () => {
    const configPath = writeConfig({ nrows: 'five' });
    expect(() => loadParameters({ ...defaults, configPath })).toThrow(ConfigurationError);
  });
});

describe('namedParts', () => {
  it('names the built parts in output order', () => {
    expect(namedParts({ right: 'r', plate: 'p', preview: 'c' })).toEqual([
      { name: 'right.stl', shape: 'r' },
      { name: 'right-plate.stl', shape: 'p' },
      { name: 'keycaps.stl', shape: 'c' },
    ]);
    expect(namedParts({ right: 1, plate: 2, left: 3, leftPlate: 4 }).map(({ name }) => name)).toEqual([
      'right.stl',
      'right-plate.stl',
      'left.stl',
      'left-plate.stl',
    ]);
  });
});

describe('formatBounds', () => {
  it('prints corners and size to one decimal', () => {
    expect(formatBounds({ min: [-1, 0, 0.25], max: [2, 3.5, 4] })).toBe(
      '[-1.0, 0.0, 0.3] → [2.0, 3.5, 4.0] (size [3.0, 3.5, 3.8])'
    );
    expect(formatBounds(null)).toBe('empty');
  });
});
