/**
 * Run configuration for the generator CLI.
 *
 * Sources, lowest precedence first: defaults, an optional JSON file, the
 * NETSYNTH_SAMPLE_COUNT / NETSYNTH_SEED environment variables, then explicit
 * overrides (CLI flags).
 */

import { readFile } from 'node:fs/promises';
import { NetsynthError, ErrorCode } from '../core/errors';
import {
  resolveModelParameters,
  type ModelParameterOverrides,
  type ModelParameters,
} from '../model/parameters';
import type { SeedingStrategy } from '../domain/types/sample';

export interface RunConfig {
  sampleCount: number;
  seed: number;
  output: string;
  includeServerDelay: boolean;
  seeding: SeedingStrategy;
  parameters: Readonly<ModelParameters>;
}

export interface RunConfigInput {
  sampleCount?: number;
  seed?: number;
  output?: string;
  includeServerDelay?: boolean;
  seeding?: SeedingStrategy;
  parameters?: ModelParameterOverrides;
}

export const DEFAULT_SAMPLE_COUNT = 500;
export const DEFAULT_SEED = 42;
export const DEFAULT_OUTPUT = 'synthetic_cdn_data.csv';

const PARAMETER_GROUPS = {
  rtt: ['mu', 'sigma'],
  serverDelay: ['mu', 'sigma'],
  loss: ['cleanProbability', 'min', 'max'],
  throughput: ['scale', 'lossWeight', 'noiseMin', 'noiseMax', 'floor'],
} as const;

export interface LoadRunConfigOptions {
  /** Path to a JSON file with RunConfigInput fields */
  file?: string;

  /** Environment to read NETSYNTH_* variables from. Default: process.env */
  env?: NodeJS.ProcessEnv;

  /** Highest-precedence values, typically from CLI flags */
  overrides?: RunConfigInput;
}

export async function loadRunConfig(options: LoadRunConfigOptions = {}): Promise<Readonly<RunConfig>> {
  const fromFile = options.file ? await readConfigFile(options.file) : {};
  const fromEnv = readEnv(options.env ?? process.env);

  return resolveRunConfig(fromFile, fromEnv, options.overrides ?? {});
}

/**
 * Merge inputs (later wins) onto the defaults and validate
 */
export function resolveRunConfig(...inputs: RunConfigInput[]): Readonly<RunConfig> {
  let merged: RunConfigInput = {};
  for (const input of inputs) {
    merged = {
      sampleCount: input.sampleCount ?? merged.sampleCount,
      seed: input.seed ?? merged.seed,
      output: input.output ?? merged.output,
      includeServerDelay: input.includeServerDelay ?? merged.includeServerDelay,
      seeding: input.seeding ?? merged.seeding,
      parameters: mergeOverrides(merged.parameters, input.parameters),
    };
  }

  const sampleCount = merged.sampleCount ?? DEFAULT_SAMPLE_COUNT;
  if (!Number.isInteger(sampleCount) || sampleCount < 1) {
    throw configError('sampleCount', sampleCount, 'must be a positive integer');
  }

  const seed = merged.seed ?? DEFAULT_SEED;
  if (!Number.isSafeInteger(seed) || seed < 0) {
    throw configError('seed', seed, 'must be a non-negative integer');
  }

  const output = merged.output ?? DEFAULT_OUTPUT;
  if (output.trim().length === 0) {
    throw configError('output', output, 'must be a non-empty path');
  }

  const seeding = merged.seeding ?? 'sequential';
  if (seeding !== 'sequential' && seeding !== 'per-row') {
    throw configError('seeding', seeding, "must be 'sequential' or 'per-row'");
  }

  return Object.freeze({
    sampleCount,
    seed,
    output,
    includeServerDelay: merged.includeServerDelay ?? false,
    seeding,
    parameters: resolveModelParameters(merged.parameters),
  });
}

/**
 * Validate an unknown JSON value into RunConfigInput
 */
export function parseRunConfigInput(raw: unknown, source = 'config'): RunConfigInput {
  if (!isRecord(raw)) {
    throw configError(source, raw, 'must be a JSON object');
  }

  const input: RunConfigInput = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'sampleCount':
      case 'seed':
        if (typeof value !== 'number') throw configError(key, value, 'must be a number');
        input[key] = value;
        break;
      case 'output':
        if (typeof value !== 'string') throw configError(key, value, 'must be a string');
        input.output = value;
        break;
      case 'includeServerDelay':
        if (typeof value !== 'boolean') throw configError(key, value, 'must be a boolean');
        input.includeServerDelay = value;
        break;
      case 'seeding':
        if (value !== 'sequential' && value !== 'per-row') {
          throw configError(key, value, "must be 'sequential' or 'per-row'");
        }
        input.seeding = value;
        break;
      case 'parameters':
        input.parameters = parseParameterOverrides(value);
        break;
      default:
        throw configError(key, value, 'is not a recognized option');
    }
  }
  return input;
}

function parseParameterOverrides(raw: unknown): ModelParameterOverrides {
  if (!isRecord(raw)) {
    throw configError('parameters', raw, 'must be an object');
  }

  const overrides: ModelParameterOverrides = {};
  for (const [group, fields] of Object.entries(raw)) {
    const path = `parameters.${group}`;
    if (!isRecord(fields)) {
      throw configError(path, fields, 'must be an object');
    }

    switch (group) {
      case 'rtt':
      case 'serverDelay':
        overrides[group] = pickNumbers(path, fields, PARAMETER_GROUPS[group]);
        break;
      case 'loss':
        overrides.loss = pickNumbers(path, fields, PARAMETER_GROUPS.loss);
        break;
      case 'throughput':
        overrides.throughput = pickNumbers(path, fields, PARAMETER_GROUPS.throughput);
        break;
      default:
        throw configError(path, fields, 'is not a model parameter group');
    }
  }
  return overrides;
}

function pickNumbers<K extends string>(
  path: string,
  fields: Record<string, unknown>,
  keys: readonly K[]
): Partial<Record<K, number>> {
  const picked: Partial<Record<K, number>> = {};
  for (const [field, value] of Object.entries(fields)) {
    if (!isOneOf(field, keys)) {
      throw configError(`${path}.${field}`, value, 'is not a model parameter');
    }
    if (typeof value !== 'number') {
      throw configError(`${path}.${field}`, value, 'must be a number');
    }
    picked[field] = value;
  }
  return picked;
}

async function readConfigFile(file: string): Promise<RunConfigInput> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new NetsynthError(ErrorCode.IO_ERROR, `Cannot read config file ${file}`, {
      path: file,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new NetsynthError(ErrorCode.INVALID_CONFIG, `Config file ${file} is not valid JSON`, {
      path: file,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return parseRunConfigInput(raw, file);
}

function readEnv(env: NodeJS.ProcessEnv): RunConfigInput {
  const input: RunConfigInput = {};
  const sampleCount = env.NETSYNTH_SAMPLE_COUNT;
  if (sampleCount !== undefined && sampleCount !== '') {
    input.sampleCount = parseIntegerOption('NETSYNTH_SAMPLE_COUNT', sampleCount);
  }
  const seed = env.NETSYNTH_SEED;
  if (seed !== undefined && seed !== '') {
    input.seed = parseIntegerOption('NETSYNTH_SEED', seed);
  }
  return input;
}

/**
 * Parse a decimal integer option; anything else is INVALID_CONFIG
 */
export function parseIntegerOption(name: string, value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw configError(name, value, 'must be an integer');
  }
  return Number(value.trim());
}

function mergeOverrides(
  base: ModelParameterOverrides | undefined,
  next: ModelParameterOverrides | undefined
): ModelParameterOverrides | undefined {
  if (!next) return base;
  if (!base) return next;
  return {
    rtt: { ...base.rtt, ...next.rtt },
    serverDelay: { ...base.serverDelay, ...next.serverDelay },
    loss: { ...base.loss, ...next.loss },
    throughput: { ...base.throughput, ...next.throughput },
  };
}

function isOneOf<K extends string>(value: string, keys: readonly K[]): value is K {
  return keys.some((key) => key === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function configError(path: string, value: unknown, reason: string): NetsynthError {
  return new NetsynthError(ErrorCode.INVALID_CONFIG, `Config option ${path} ${reason}`, {
    path,
    value,
  });
}
