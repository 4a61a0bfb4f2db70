/**
 * `txrecon generate`: write sample source and compliance feeds
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { generateSampleData, type SampleData } from '../sample-data.js';
import { writeOut, type CommandIO, type CommandResult } from './io.js';

export const SOURCE_SAMPLE_FILE = 'payment_platform_transactions.json';
export const TARGET_SAMPLE_FILE = 'compliance_transactions.json';

export interface GenerateCommandOptions {
  outDir: string;
  count?: number;
  seed?: number;
  asOf?: Date;
}

export interface GenerateCommandResult extends CommandResult {
  sourcePath: string;
  targetPath: string;
  data: SampleData;
}

export async function generateCommand(
  options: GenerateCommandOptions,
  io: CommandIO = {}
): Promise<GenerateCommandResult> {
  const outDir = resolve(process.cwd(), options.outDir);
  const data = generateSampleData({ count: options.count, seed: options.seed, asOf: options.asOf });

  await mkdir(outDir, { recursive: true });
  const sourcePath = join(outDir, SOURCE_SAMPLE_FILE);
  const targetPath = join(outDir, TARGET_SAMPLE_FILE);
  await writeFile(sourcePath, `${JSON.stringify(data.source, null, 2)}\n`, 'utf-8');
  await writeFile(targetPath, `${JSON.stringify(data.target, null, 2)}\n`, 'utf-8');

  const { scenarios } = data;
  writeOut(
    io,
    [
      `Generated ${data.source.length} payment platform transactions: ${sourcePath}`,
      `Generated ${data.target.length} compliance transactions: ${targetPath}`,
      `- Matching: ${scenarios.match}`,
      `- Missing in compliance: ${scenarios.missing}`,
      `- With differences: ${scenarios.difference}`,
      `- Duplicated in compliance: ${scenarios.duplicate}`,
    ].join('\n')
  );

  return { exitCode: 0, sourcePath, targetPath, data };
}
