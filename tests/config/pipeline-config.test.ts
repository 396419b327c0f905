import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  ConfigError,
  DEFAULT_CONFIG_PATH,
  loadPipelineConfig,
  resolveEnvConfig,
  validatePipelineConfig,
} from '../../src/config/pipeline-config';
import { expandMatrix } from '../../src/engine/matrix-expander';
import { isGroupAdmitted } from '../../src/engine/trigger-policy';
import { LogLevel } from '../../src/logger';

function validDocument(): Record<string, unknown> {
  return {
    admission: { admitKinds: ['pull_request'], cancelInProgressOn: ['pull_request'] },
    build: { dockerfile: 'Dockerfile.build', tag: 'test-image:latest' },
    sandbox: { dockerfile: 'Dockerfile.tests' },
    matrix: {
      groups: [
        { name: 'A', timeoutMinutes: 30, members: ['job1', 'job2'] },
        { name: 'B', timeoutMs: 5000, members: ['job3'], when: ['push'] },
      ],
    },
  };
}

describe('validatePipelineConfig', () => {
  test('normalizes a valid document', () => {
    const result = validatePipelineConfig(validDocument());

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.config?.recipe).toEqual({
      dockerfile: 'Dockerfile.build',
      context: '.',
      tag: 'test-image:latest',
      buildArgs: undefined,
    });
    expect(result.config?.sandbox).toEqual({
      dockerfile: 'Dockerfile.tests',
      context: '.',
      coverageFile: 'lcov.info',
      coverageFormat: 'lcov',
    });
    expect(result.config?.matrix.groups).toEqual([
      { name: 'A', timeoutMs: 1_800_000, members: ['job1', 'job2'] },
      { name: 'B', timeoutMs: 5000, members: ['job3'], when: ['push'] },
    ]);
  });

  test('falls back to the default admission policy', () => {
    const doc = validDocument();
    delete doc.admission;

    const result = validatePipelineConfig(doc);
    expect(result.config?.policy).toEqual({ admitKinds: ['pull_request'], cancelInProgressOn: ['pull_request'] });
  });

  test('reports every problem it finds', () => {
    const result = validatePipelineConfig({
      admission: { admitKinds: ['merge_group'] },
      build: { dockerfile: 'Dockerfile.build' },
      matrix: { groups: [{ name: 'A', members: ['job1'] }, { timeoutMinutes: 5, members: [] }] },
    });

    expect(result.valid).toBe(false);
    expect(result.config).toBeUndefined();
    expect(result.errors).toEqual([
      'admission.admitKinds contains unknown trigger kind: merge_group',
      'build.dockerfile and build.tag are required',
      'sandbox is required',
      'matrix.groups[0] (A) needs a positive timeoutMinutes or timeoutMs',
      'matrix.groups[1].name is required',
    ]);
  });

  test('rejects duplicate group names', () => {
    const doc = validDocument();
    doc.matrix = {
      groups: [
        { name: 'A', timeoutMinutes: 1, members: ['x'] },
        { name: 'A', timeoutMinutes: 1, members: ['y'] },
      ],
    };

    expect(validatePipelineConfig(doc).errors).toEqual(['Duplicate matrix group name: A']);
  });

  test('rejects a timeout no single timer can hold', () => {
    const doc = validDocument();
    doc.matrix = {
      groups: [
        { name: 'A', timeoutMinutes: 36_000, members: ['x'] },
        { name: 'B', timeoutMs: 2_147_483_647, members: ['y'] },
      ],
    };

    const result = validatePipelineConfig(doc);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['matrix.groups[0] (A) timeout exceeds the maximum of 2147483647ms']);
  });

  test('warns about empty groups', () => {
    const doc = validDocument();
    doc.matrix = { groups: [{ name: 'A', timeoutMinutes: 1, members: [] }] };

    const result = validatePipelineConfig(doc);
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['Matrix group "A" has no members']);
  });

  test('rejects a non-object document', () => {
    expect(validatePipelineConfig([]).errors).toEqual(['Config must be a JSON object']);
  });
});

describe('loadPipelineConfig', () => {
  test('loads the shipped configuration', () => {
    const config = loadPipelineConfig(DEFAULT_CONFIG_PATH);

    expect(config.policy.admitKinds).toEqual(['pull_request']);
    expect(config.matrix.groups.map((g) => [g.name, g.timeoutMs, g.members.length])).toEqual([
      ['sampled-genesis', 1_800_000, 30],
      ['atlas', 2_400_000, 2],
    ]);

    const jobs = expandMatrix(config.matrix, { includeGroup: (g) => isGroupAdmitted(g, 'pull_request') });
    expect(jobs).toHaveLength(32);
    expect(new Set(jobs.map((j) => j.name)).size).toBe(32);
  });

  test('throws ConfigError for a missing file', () => {
    expect(() => loadPipelineConfig(path.join(os.tmpdir(), 'does-not-exist', 'pipeline.json'))).toThrow(ConfigError);
  });

  test('throws ConfigError for an invalid document', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-config-'));
    const file = path.join(dir, 'pipeline.json');
    fs.writeFileSync(file, JSON.stringify({ build: {} }));

    try {
      let caught: unknown;
      try {
        loadPipelineConfig(file);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ConfigError);
      if (caught instanceof ConfigError) {
        expect(caught.typedError.code).toBe('VALIDATION.SCHEMA');
        expect(caught.typedError.details?.path).toBe(file);
      }
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('resolveEnvConfig', () => {
  test('uses defaults for an empty environment', () => {
    const env = resolveEnvConfig({});

    expect(env.port).toBe(5000);
    expect(env.logLevel).toBe(LogLevel.Info);
    expect(env.configPath).toBe(DEFAULT_CONFIG_PATH);
    expect(env.workDir).toBe(path.resolve('.matrix-fanout'));
    expect(env.coverageUrl).toBeUndefined();
    expect(env.coverageToken).toBeUndefined();
  });

  test('reads settings from the environment', () => {
    const env = resolveEnvConfig({
      PORT: '8080',
      LOG_LEVEL: 'DEBUG',
      PIPELINE_CONFIG: '/etc/pipeline.json',
      WORK_DIR: '/var/lib/matrix',
      COVERAGE_UPLOAD_URL: 'https://coverage.example.test/upload',
      COVERAGE_TOKEN: 'test-secret',
    });

    expect(env).toEqual({
      port: 8080,
      logLevel: LogLevel.Debug,
      configPath: '/etc/pipeline.json',
      workDir: '/var/lib/matrix',
      coverageUrl: 'https://coverage.example.test/upload',
      coverageToken: 'test-secret',
    });
  });

  test('ignores an unknown log level and a malformed port', () => {
    const env = resolveEnvConfig({ PORT: 'eighty', LOG_LEVEL: 'verbose' });
    expect(env.port).toBe(5000);
    expect(env.logLevel).toBe(LogLevel.Info);
  });
});
