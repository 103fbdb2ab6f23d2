import fs from 'fs';
import { ConfigError } from './errors.js';

/**
 * Invocation parameters as they arrive from the command line, a config
 * file or a library caller. Every field is optional here; `url` is
 * enforced once all sources are merged.
 */
export interface GenerateParams {
  url?: string;
  design?: string;
  output?: string;
  title?: string;
  subtitle?: string;
  footer?: string;
}

const PARAM_KEYS = ['url', 'design', 'output', 'title', 'subtitle', 'footer'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toParams(value: unknown, file: string, label: string): GenerateParams {
  if (!isRecord(value)) {
    throw new ConfigError(file, `${label} must be a JSON object`);
  }

  const params: GenerateParams = {};
  for (const key of PARAM_KEYS) {
    const field = value[key];
    if (field === undefined || field === null) {
      continue;
    }
    if (typeof field !== 'string') {
      throw new ConfigError(file, `${label}: "${key}" must be a string`);
    }
    params[key] = field;
  }
  return params;
}

function readJson(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new ConfigError(file, 'Configuration file not found', { cause: error });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(file, 'Invalid JSON in configuration file', { cause: error });
  }
}

/**
 * Load a single configuration record. Unknown keys are ignored.
 */
export function loadConfigFile(file: string): GenerateParams {
  return toParams(readJson(file), file, 'Configuration');
}

/**
 * Load a batch file: a JSON array of configuration records.
 */
export function loadBatchFile(file: string): GenerateParams[] {
  const data = readJson(file);
  if (!Array.isArray(data)) {
    throw new ConfigError(file, 'Batch file must contain a JSON array');
  }
  return data.map((entry: unknown, i) => toParams(entry, file, `Batch entry ${i}`));
}

/**
 * Merge parameter sources; earlier sources win. A blank string counts as unset.
 */
export function mergeParams(...sources: GenerateParams[]): GenerateParams {
  const merged: GenerateParams = {};
  for (const key of PARAM_KEYS) {
    for (const source of sources) {
      const value = source[key];
      if (value !== undefined && value.trim() !== '') {
        merged[key] = value;
        break;
      }
    }
  }
  return merged;
}
