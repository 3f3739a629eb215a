import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { main, runGenerate, type Logger } from '../../cli/program';
import { resolveRunConfig } from '../../config/RunConfig';
import { SampleGenerator, generateSamples } from '../../generator/SampleGenerator';
import { toCsv, parseCsv } from '../../io/csv';

interface CapturedLogger extends Logger {
  infos: string[];
  errors: string[];
}

function captureLogger(): CapturedLogger {
  const infos: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    errors,
    info: (message) => infos.push(message),
    warn: (message) => errors.push(message),
    error: (message) => errors.push(message),
  };
}

describe('netsynth CLI', () => {
  let dir: string;
  let output: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'netsynth-cli-'));
    output = path.join(dir, 'samples.csv');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const argv = (...args: string[]) => ['node', 'netsynth', ...args];

  describe('generate', () => {
    it('writes the CSV for the requested samples and seed', async () => {
      const logger = captureLogger();
      const code = await main(argv('generate', '-n', '20', '-s', '7', '-o', output), logger);

      expect(code).toBe(0);
      expect(await readFile(output, 'utf8')).toBe(toCsv(generateSamples(20, 7)));
      expect(logger.errors).toEqual([]);
    });

    it('logs the banner, the saved file and the summary', async () => {
      const logger = captureLogger();
      await main(argv('generate', '-n', '20', '-s', '7', '-o', output), logger);

      expect(logger.infos[1]).toBe('SYNTHETIC CDN DATA GENERATOR');
      expect(logger.infos[3]).toBe('Generating 20 synthetic samples (seed 7, sequential)...');
      expect(logger.infos).toContain(`✓ Saved 20 rows to '${output}'`);
      expect(logger.infos.at(-1)).toContain('RTT-Throughput Correlation:');
    });

    it('stays silent with --quiet', async () => {
      const logger = captureLogger();
      const code = await main(argv('generate', '-n', '5', '-o', output, '--quiet'), logger);

      expect(code).toBe(0);
      expect(logger.infos).toEqual([]);
    });

    it('honours --seeding and --include-server-delay', async () => {
      const logger = captureLogger();
      await main(
        argv('generate', '-n', '10', '-s', '3', '-o', output, '--seeding', 'per-row', '--include-server-delay', '-q'),
        logger
      );

      const expected = new SampleGenerator({ seeding: 'per-row' }).generate(10, 3);
      expect(await readFile(output, 'utf8')).toBe(toCsv(expected, { includeServerDelay: true }));
    });

    it('reads model overrides from a config file', async () => {
      const configPath = path.join(dir, 'netsynth.json');
      await writeFile(configPath, JSON.stringify({ parameters: { loss: { cleanProbability: 1 } } }));

      const code = await main(argv('generate', '-n', '50', '-o', output, '-c', configPath, '-q'), captureLogger());

      expect(code).toBe(0);
      const records = parseCsv(await readFile(output, 'utf8'));
      expect(records).toHaveLength(50);
      expect(records.every((record) => record.loss === 0)).toBe(true);
    });
  });

  describe('failures', () => {
    it('reports invalid configuration and exits with 1', async () => {
      const logger = captureLogger();
      const code = await main(argv('generate', '-n', '0', '-o', output), logger);

      expect(code).toBe(1);
      expect(logger.errors).toHaveLength(1);
      expect(logger.errors[0]).toMatch(
        /^NetsynthError \[INVALID_CONFIG\]: Config option sampleCount must be a positive integer/
      );
    });

    it('rejects non-integer flags through commander', async () => {
      const logger = captureLogger();
      const code = await main(argv('generate', '-n', 'many', '-o', output), logger);

      expect(code).toBe(1);
      expect(logger.errors.join('\n')).toContain('Not an integer.');
    });

    it('rejects an unknown seeding strategy', async () => {
      const logger = captureLogger();
      const code = await main(argv('generate', '--seeding', 'random', '-o', output), logger);

      expect(code).toBe(1);
      expect(logger.errors.join('\n')).toContain("Expected 'sequential' or 'per-row'.");
    });
  });

  it('prints the version and exits with 0', async () => {
    const logger = captureLogger();
    expect(await main(argv('--version'), logger)).toBe(0);
    expect(logger.infos).toEqual(['0.1.0']);
  });
});

describe('runGenerate', () => {
  it('returns the output path and the summary', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'netsynth-run-'));
    try {
      const config = resolveRunConfig({ sampleCount: 30, seed: 5, output: path.join(dir, 'out.csv') });
      const result = await runGenerate(config, captureLogger());

      expect(result.output).toBe(config.output);
      expect(result.summary.sampleCount).toBe(30);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
