import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, expandEnvVars, loadConfig, parseConfig } from '../src/config.js';

const MINIMAL = {
  source: { feed: { type: 'json', filePath: './in/source.json' } },
  target: { feed: { type: 'csv', filePath: '/feeds/target.csv', delimiter: ';' } },
};

describe('expandEnvVars', () => {
  it('expands variables and defaults in nested strings', () => {
    const env = { FEED_DIR: '/data' };
    expect(
      expandEnvVars({ a: '${FEED_DIR}/x.json', b: ['${MISSING:-fallback}'], n: 3 }, { env })
    ).toEqual({ a: '/data/x.json', b: ['fallback'], n: 3 });
  });

  it('fails on a missing variable unless allowed', () => {
    expect(() => expandEnvVars('${NOPE}', { env: {} })).toThrow(
      'Missing required environment variable: NOPE'
    );
    expect(expandEnvVars('${NOPE}', { env: {}, allowMissing: true })).toBe('${NOPE}');
  });
});

describe('parseConfig', () => {
  it('applies defaults and resolves paths against the config directory', () => {
    const config = parseConfig(MINIMAL, '/cfg', { env: {} });

    expect(config).toEqual({
      source: {
        system: 'Payment Platform',
        feed: { type: 'json', filePath: '/cfg/in/source.json' },
      },
      target: {
        system: 'Compliance System',
        feed: { type: 'csv', filePath: '/feeds/target.csv', delimiter: ';' },
      },
      flagTargetOnlyDuplicates: false,
      output: {
        dir: '/cfg',
        runLogsDir: '/cfg/run_logs',
        discrepanciesDir: '/cfg/discrepancies',
        resultsFile: '/cfg/reconciliation_results.json',
        exceptionsCsv: false,
      },
      logging: {},
    });
  });

  it('keeps explicit output locations and the log file', () => {
    const config = parseConfig(
      {
        ...MINIMAL,
        reconciliation: { flagTargetOnlyDuplicates: true },
        output: { dir: 'out', runLogsDir: '/var/runs', exceptionsCsv: true },
        logging: { level: 'debug', file: 'logs/recon.log' },
      },
      '/cfg',
      { env: {} }
    );

    expect(config.flagTargetOnlyDuplicates).toBe(true);
    expect(config.output).toEqual({
      dir: '/cfg/out',
      runLogsDir: '/var/runs',
      discrepanciesDir: '/cfg/out/discrepancies',
      resultsFile: '/cfg/out/reconciliation_results.json',
      exceptionsCsv: true,
    });
    expect(config.logging).toEqual({ level: 'debug', file: '/cfg/logs/recon.log' });
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ ...MINIMAL, extra: 1 }, '/cfg', { env: {} })).toThrow(
      "- (root): Unrecognized key(s) in object: 'extra'"
    );
  });

  it('rejects an unknown feed type', () => {
    const config = { ...MINIMAL, source: { feed: { type: 'xml', filePath: 'a.xml' } } };
    expect(() => parseConfig(config, '/cfg', { env: {} })).toThrow(/- source\.feed\.type: Invalid discriminator value/);
  });

  it('rejects a source and target naming the same system', () => {
    const config = {
      source: { ...MINIMAL.source, system: 'Ledger' },
      target: { ...MINIMAL.target, system: 'Ledger' },
    };
    expect(() => parseConfig(config, '/cfg', { env: {} })).toThrow(
      '- target.system: Source and target must name different systems (both are "Ledger")'
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'txrecon-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a config file with a byte order mark and env placeholders', async () => {
    const configPath = join(dir, 'config.json');
    writeFileSync(
      configPath,
      '\uFEFF' +
        JSON.stringify({
          ...MINIMAL,
          source: { system: '${SOURCE_NAME}', feed: MINIMAL.source.feed },
        })
    );

    const config = await loadConfig(configPath, { env: { SOURCE_NAME: 'Core Ledger' } });
    expect(config.source.system).toBe('Core Ledger');
    expect(config.source.feed.filePath).toBe(join(dir, 'in', 'source.json'));
  });

  it('reports invalid JSON as a ConfigError', async () => {
    const configPath = join(dir, 'config.json');
    writeFileSync(configPath, '{ "source": ');

    await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigError);
  });

  it('reports a missing file', async () => {
    const configPath = join(dir, 'absent.json');
    await expect(loadConfig(configPath)).rejects.toThrow(`Cannot read config file: ${configPath}`);
  });
});
