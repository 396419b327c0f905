/**
 * Pipeline configuration.
 *
 * The matrix, trigger policy, build recipe, sandbox and coverage settings
 * live in one JSON document (default: `config/pipeline.json`). Process-level
 * settings come from the environment.
 *
 * Usage:
 *   const env = resolveEnvConfig();
 *   const config = loadPipelineConfig(env.configPath);
 *   const jobs = expandMatrix(config.matrix);
 */

import fs from 'fs';
import path from 'path';
import { TypedError, validationError } from '../domain/errors';
import { GroupCondition, MAX_TIMER_MS, MatrixDeclaration, MatrixGroup } from '../domain/matrix';
import { DEFAULT_TRIGGER_POLICY, TriggerKind, TriggerPolicy, isTriggerKind } from '../domain/trigger';
import { BuildRecipe } from '../engine/collaborators';
import { LogLevel, isLogLevel } from '../logger';

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../config/pipeline.json');

/** How each job's test image is built and where its coverage lands. */
export interface SandboxSettings {
  dockerfile: string;
  context: string;
  /** File name inside the job's output directory. */
  coverageFile: string;
  coverageFormat: string;
}

export interface CoverageSettings {
  /** Upload endpoint; `COVERAGE_UPLOAD_URL` overrides it. */
  url?: string;
}

export interface PipelineConfig {
  policy: TriggerPolicy;
  recipe: BuildRecipe;
  sandbox: SandboxSettings;
  coverage: CoverageSettings;
  matrix: MatrixDeclaration;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  config?: PipelineConfig;
}

/** Process-level settings. */
export interface EnvConfig {
  port: number;
  logLevel: LogLevel;
  configPath: string;
  /** Root for image tarballs and per-job output directories. */
  workDir: string;
  coverageUrl?: string;
  coverageToken?: string;
}

/** Configuration error wrapper. */
export class ConfigError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ConfigError';
  }
}

const MINUTE_MS = 60_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function readKinds(value: unknown, field: string, errors: string[]): TriggerKind[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    errors.push(`${field} must be an array of trigger kinds`);
    return undefined;
  }
  const kinds: TriggerKind[] = [];
  for (const entry of value) {
    if (isTriggerKind(entry)) kinds.push(entry);
    else errors.push(`${field} contains unknown trigger kind: ${String(entry)}`);
  }
  return kinds;
}

function readStringMap(value: unknown, field: string, errors: string[]): Record<string, string> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    errors.push(`${field} must be an object of strings`);
    return undefined;
  }
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') out[key] = entry;
    else errors.push(`${field}.${key} must be a string`);
  }
  return out;
}

function readGroup(value: unknown, index: number, errors: string[], warnings: string[]): MatrixGroup | undefined {
  const where = `matrix.groups[${index}]`;
  if (!isRecord(value)) {
    errors.push(`${where} must be an object`);
    return undefined;
  }
  if (!isNonEmptyString(value.name)) {
    errors.push(`${where}.name is required`);
    return undefined;
  }

  let timeoutMs: number | undefined;
  if (typeof value.timeoutMs === 'number') {
    timeoutMs = value.timeoutMs;
  } else if (typeof value.timeoutMinutes === 'number') {
    timeoutMs = value.timeoutMinutes * MINUTE_MS;
  }
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    errors.push(`${where} (${value.name}) needs a positive timeoutMinutes or timeoutMs`);
    return undefined;
  }
  if (timeoutMs > MAX_TIMER_MS) {
    errors.push(`${where} (${value.name}) timeout exceeds the maximum of ${MAX_TIMER_MS}ms`);
    return undefined;
  }

  if (!Array.isArray(value.members) || !value.members.every(isNonEmptyString)) {
    errors.push(`${where} (${value.name}).members must be an array of test names`);
    return undefined;
  }
  if (value.members.length === 0) {
    warnings.push(`Matrix group "${value.name}" has no members`);
  }

  let when: GroupCondition | undefined;
  if (value.when === 'always') {
    when = 'always';
  } else if (value.when !== undefined) {
    when = readKinds(value.when, `${where}.when`, errors);
  }

  return { name: value.name, timeoutMs, members: [...value.members], ...(when !== undefined ? { when } : {}) };
}

/** Validate a parsed config document and normalize it into a PipelineConfig. */
export function validatePipelineConfig(raw: unknown): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isRecord(raw)) {
    return { valid: false, errors: ['Config must be a JSON object'], warnings };
  }

  // --- admission ---
  const admission = raw.admission === undefined ? {} : raw.admission;
  let policy: TriggerPolicy = { ...DEFAULT_TRIGGER_POLICY };
  if (!isRecord(admission)) {
    errors.push('admission must be an object');
  } else {
    policy = {
      admitKinds: readKinds(admission.admitKinds, 'admission.admitKinds', errors) ?? DEFAULT_TRIGGER_POLICY.admitKinds,
      cancelInProgressOn:
        readKinds(admission.cancelInProgressOn, 'admission.cancelInProgressOn', errors) ??
        DEFAULT_TRIGGER_POLICY.cancelInProgressOn,
    };
    if (policy.admitKinds.length === 0) {
      warnings.push('admission.admitKinds is empty; no trigger will start a run');
    }
  }

  // --- build ---
  let recipe: BuildRecipe | undefined;
  if (!isRecord(raw.build)) {
    errors.push('build is required');
  } else if (!isNonEmptyString(raw.build.dockerfile) || !isNonEmptyString(raw.build.tag)) {
    errors.push('build.dockerfile and build.tag are required');
  } else {
    recipe = {
      dockerfile: raw.build.dockerfile,
      context: isNonEmptyString(raw.build.context) ? raw.build.context : '.',
      tag: raw.build.tag,
      buildArgs: readStringMap(raw.build.buildArgs, 'build.buildArgs', errors),
    };
  }

  // --- sandbox ---
  let sandbox: SandboxSettings | undefined;
  if (!isRecord(raw.sandbox)) {
    errors.push('sandbox is required');
  } else if (!isNonEmptyString(raw.sandbox.dockerfile)) {
    errors.push('sandbox.dockerfile is required');
  } else {
    sandbox = {
      dockerfile: raw.sandbox.dockerfile,
      context: isNonEmptyString(raw.sandbox.context) ? raw.sandbox.context : '.',
      coverageFile: isNonEmptyString(raw.sandbox.coverageFile) ? raw.sandbox.coverageFile : 'lcov.info',
      coverageFormat: isNonEmptyString(raw.sandbox.coverageFormat) ? raw.sandbox.coverageFormat : 'lcov',
    };
  }

  // --- coverage ---
  const coverage: CoverageSettings = {};
  if (raw.coverage !== undefined) {
    if (!isRecord(raw.coverage)) {
      errors.push('coverage must be an object');
    } else if (raw.coverage.url !== undefined) {
      if (isNonEmptyString(raw.coverage.url)) coverage.url = raw.coverage.url;
      else errors.push('coverage.url must be a non-empty string');
    }
  }

  // --- matrix ---
  const groups: MatrixGroup[] = [];
  if (!isRecord(raw.matrix) || !Array.isArray(raw.matrix.groups)) {
    errors.push('matrix.groups must be an array');
  } else {
    raw.matrix.groups.forEach((entry: unknown, index: number) => {
      const group = readGroup(entry, index, errors, warnings);
      if (group) groups.push(group);
    });
    const names = new Set<string>();
    for (const group of groups) {
      if (names.has(group.name)) errors.push(`Duplicate matrix group name: ${group.name}`);
      names.add(group.name);
    }
    if (groups.length === 0) warnings.push('matrix declares no groups');
  }

  if (errors.length > 0 || !recipe || !sandbox) {
    return { valid: false, errors, warnings };
  }

  return {
    valid: true,
    errors,
    warnings,
    config: { policy, recipe, sandbox, coverage, matrix: { groups } },
  };
}

/** Read and validate a config file. Throws ConfigError when it is unusable. */
export function loadPipelineConfig(filePath: string = DEFAULT_CONFIG_PATH): PipelineConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      validationError(`Cannot read pipeline config at ${filePath}`, {
        path: filePath,
        cause: err instanceof Error ? err.message : String(err),
      }),
    );
  }

  const result = validatePipelineConfig(raw);
  if (!result.valid || !result.config) {
    throw new ConfigError(validationError('Invalid pipeline config', { path: filePath, errors: result.errors }));
  }
  return result.config;
}

/** Resolve process-level settings from environment variables. */
export function resolveEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const port = parseInt(env.PORT ?? '5000', 10);
  const logLevel = env.LOG_LEVEL?.toLowerCase();
  return {
    port: Number.isFinite(port) ? port : 5000,
    logLevel: isLogLevel(logLevel) ? logLevel : LogLevel.Info,
    configPath: env.PIPELINE_CONFIG ? path.resolve(env.PIPELINE_CONFIG) : DEFAULT_CONFIG_PATH,
    workDir: path.resolve(env.WORK_DIR ?? '.matrix-fanout'),
    coverageUrl: env.COVERAGE_UPLOAD_URL || undefined,
    coverageToken: env.COVERAGE_TOKEN || undefined,
  };
}
