import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_SOURCE_SYSTEM, DEFAULT_TARGET_SYSTEM } from '@txrecon/recon-core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const encodingSchema = z.enum(['utf-8', 'utf8', 'utf16le', 'latin1', 'ascii']);

const feedBase = z.object({
  filePath: z.string().min(1),
  encoding: encodingSchema.optional(),
});

const jsonFeed = feedBase
  .extend({
    type: z.literal('json'),
    recordsPath: z.string().optional(),
  })
  .strict();

const csvFeed = feedBase
  .extend({
    type: z.literal('csv'),
    delimiter: z.string().min(1).optional(),
    quote: z.string().min(1).optional(),
    skipEmptyLines: z.boolean().optional(),
    numericColumns: z.array(z.string().min(1)).optional(),
  })
  .strict();

const excelFeed = feedBase
  .extend({
    type: z.literal('excel'),
    sheet: z.union([z.string().min(1), z.number().int().min(1)]).optional(),
    startRow: z.number().int().min(1).optional(),
    startColumn: z.number().int().min(1).optional(),
  })
  .strict();

export const feedEntrySchema = z.discriminatedUnion('type', [jsonFeed, csvFeed, excelFeed]);

export type FeedEntry = z.infer<typeof feedEntrySchema>;

const sideSchema = (defaultSystem: string) =>
  z
    .object({
      system: z.string().min(1).default(defaultSystem),
      feed: feedEntrySchema,
    })
    .strict();

export const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    file: z.string().min(1).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    source: sideSchema(DEFAULT_SOURCE_SYSTEM),
    target: sideSchema(DEFAULT_TARGET_SYSTEM),
    reconciliation: z
      .object({
        flagTargetOnlyDuplicates: z.boolean().optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        dir: z.string().min(1).default('.'),
        runLogsDir: z.string().min(1).optional(),
        discrepanciesDir: z.string().min(1).optional(),
        resultsFile: z.string().min(1).optional(),
        exceptionsCsv: z.boolean().optional(),
      })
      .strict()
      .default({}),
    logging: loggingSchema.optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.source.system === value.target.system) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Source and target must name different systems (both are "${value.source.system}")`,
        path: ['target', 'system'],
      });
    }
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Config with every path absolute and every output location filled in */
export interface ResolvedConfig {
  source: { system: string; feed: FeedEntry };
  target: { system: string; feed: FeedEntry };
  flagTargetOnlyDuplicates: boolean;
  output: {
    dir: string;
    runLogsDir: string;
    discrepanciesDir: string;
    resultsFile: string;
    exceptionsCsv: boolean;
  };
  logging: z.infer<typeof loggingSchema>;
}

export function formatZodError(err: z.ZodError, label = 'Invalid config file'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Resolve relative paths against the directory holding the config file
 */
export function resolveConfig(config: ConfigFile, baseDir: string): ResolvedConfig {
  const at = (path: string) => (isAbsolute(path) ? path : resolve(baseDir, path));
  const outputDir = at(config.output.dir);
  const feed = (entry: FeedEntry): FeedEntry => ({ ...entry, filePath: at(entry.filePath) });

  return {
    source: { system: config.source.system, feed: feed(config.source.feed) },
    target: { system: config.target.system, feed: feed(config.target.feed) },
    flagTargetOnlyDuplicates: config.reconciliation?.flagTargetOnlyDuplicates ?? false,
    output: {
      dir: outputDir,
      runLogsDir: config.output.runLogsDir ? at(config.output.runLogsDir) : join(outputDir, 'run_logs'),
      discrepanciesDir: config.output.discrepanciesDir
        ? at(config.output.discrepanciesDir)
        : join(outputDir, 'discrepancies'),
      resultsFile: config.output.resultsFile
        ? at(config.output.resultsFile)
        : join(outputDir, 'reconciliation_results.json'),
      exceptionsCsv: config.output.exceptionsCsv ?? false,
    },
    logging: {
      ...config.logging,
      ...(config.logging?.file ? { file: at(config.logging.file) } : {}),
    },
  };
}

/**
 * Parse, expand and validate a config document
 */
export function parseConfig(
  raw: unknown,
  baseDir: string,
  options?: EnvExpansionOptions
): ResolvedConfig {
  const expanded = expandEnvVars(raw, options);
  const result = configFileSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return resolveConfig(result.data, baseDir);
}

export async function loadConfig(
  configPath: string,
  options?: EnvExpansionOptions
): Promise<ResolvedConfig> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${absolutePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(
      `Config file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  return parseConfig(parsed, dirname(absolutePath), options);
}
