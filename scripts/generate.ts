/**
 * CASE GENERATOR
 *
 * Builds the case parts and writes them as binary STL files.
 * Usage: tsx scripts/generate.ts [--config params.json] [--out things]
 *        [--style standard|orthographic|fixed] [--left] [--preview] [--zip] [--summary]
 *
 * --summary builds with the point-cloud kernel and prints part bounds without writing files.
 */

import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ColumnStyle, ShapeParameters } from '../types';
import { bundleParts, exportPart, type ExportedPart } from '../utils/export/stl';
import { ConfigurationError } from '../utils/errors';
import {
  buildCase,
  createBuildContext,
  jscadKernel,
  pointCloudKernel,
  type Bounds,
  type CaseParts,
} from '../utils/geometry';
import { createShapeParameters, parseShapeOverrides } from '../utils/params';

export interface GenerateOptions {
  configPath?: string;
  outDir: string;
  style?: ColumnStyle;
  left: boolean;
  preview: boolean;
  zip: boolean;
  summary: boolean;
}

const COLUMN_STYLES: readonly ColumnStyle[] = ['standard', 'orthographic', 'fixed'];

const isColumnStyle = (value: string): value is ColumnStyle => COLUMN_STYLES.some((style) => style === value);

export const parseArgs = (argv: readonly string[]): GenerateOptions => {
  const options: GenerateOptions = { outDir: 'things', left: false, preview: false, zip: false, summary: false };

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
        options.configPath = valueOf(arg, i++);
        break;
      case '--out':
        options.outDir = valueOf(arg, i++);
        break;
      case '--style': {
        const style = valueOf(arg, i++);
        if (!isColumnStyle(style)) {
          throw new Error(`--style must be one of ${COLUMN_STYLES.join(', ')}, got "${style}"`);
        }
        options.style = style;
        break;
      }
      case '--left':
        options.left = true;
        break;
      case '--preview':
        options.preview = true;
        break;
      case '--zip':
        options.zip = true;
        break;
      case '--summary':
        options.summary = true;
        break;
      default:
        throw new Error(`unknown option: ${arg}`);
    }
  }
  return options;
};

export const loadParameters = (options: GenerateOptions): ShapeParameters => {
  const overrides = options.configPath
    ? parseShapeOverrides(JSON.parse(fs.readFileSync(options.configPath, 'utf8')))
    : {};
  return createShapeParameters(options.style ? { ...overrides, columnStyle: options.style } : overrides);
};

/**
 * File name for every part that was built, in output order.
 */
export const namedParts = <S>(parts: CaseParts<S>): Array<{ name: string; shape: S }> => {
  const named: Array<{ name: string; shape: S }> = [
    { name: 'right.stl', shape: parts.right },
    { name: 'right-plate.stl', shape: parts.plate },
  ];
  if (parts.left) named.push({ name: 'left.stl', shape: parts.left });
  if (parts.leftPlate) named.push({ name: 'left-plate.stl', shape: parts.leftPlate });
  if (parts.preview) named.push({ name: 'keycaps.stl', shape: parts.preview });
  return named;
};

const formatVec = (v: readonly number[]): string => `[${v.map((n) => n.toFixed(1)).join(', ')}]`;

export const formatBounds = (bounds: Bounds | null): string =>
  bounds === null
    ? 'empty'
    : `${formatVec(bounds.min)} → ${formatVec(bounds.max)} (size ${formatVec(
        bounds.max.map((max, axis) => max - bounds.min[axis])
      )})`;

const main = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));
  const started = Date.now();
  const params = loadParameters(options);

  console.log(
    `Generating ${params.ncols}x${params.nrows} ${params.columnStyle} case ` +
      `(inner column: ${params.innerColumn}, 1.5u pinky: ${params.pinky15u}, extra row: ${params.extraRow})`
  );

  const buildOptions = {
    left: options.left,
    preview: options.preview,
    onProgress: (stage: string) => console.log(`  ${stage}...`),
  };

  if (options.summary) {
    const ctx = createBuildContext(params, pointCloudKernel);
    for (const { name, shape } of namedParts(buildCase(ctx, buildOptions))) {
      console.log(`${name}: ${formatBounds(pointCloudKernel.bounds(shape))}`);
    }
    return;
  }

  const ctx = createBuildContext(params, jscadKernel);
  const exported: ExportedPart[] = namedParts(buildCase(ctx, buildOptions)).map(({ name, shape }) =>
    exportPart(name, shape)
  );

  fs.mkdirSync(options.outDir, { recursive: true });
  for (const part of exported) {
    const file = path.join(options.outDir, part.name);
    fs.writeFileSync(file, part.data);
    console.log(`Exported ${part.triangles} triangles to ${file}`);
  }

  if (options.zip) {
    const file = path.join(options.outDir, 'case.zip');
    fs.writeFileSync(file, await bundleParts(exported));
    console.log(`Bundled ${exported.length} parts into ${file}`);
  }

  console.log(`Done in ${((Date.now() - started) / 1000).toFixed(1)}s`);
};

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  main().catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
    } else {
      console.error('Generation failed:', error);
    }
    process.exitCode = 1;
  });
}
