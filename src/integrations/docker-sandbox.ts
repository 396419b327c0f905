/**
 * Runs one matrix job in Docker.
 *
 * The run's tarball is loaded, then the test image is built with
 * `--build-arg test_name=<job>` and its filesystem exported to a per-job
 * output directory, where the coverage file is picked up. The test's exit
 * status is the build's exit status.
 */

import { promises as fsp } from 'fs';
import path from 'path';
import { SandboxSettings } from '../config/pipeline-config';
import { logger } from '../logger';
import { ExecutionSandbox, SandboxRequest, SandboxResult } from '../engine/collaborators';
import { CommandRunner, spawnCommand } from './command';
import { DockerOptions, runDocker } from './docker-builder';

const log = logger.child({ module: 'docker-sandbox' });

/** Directory-safe form of a job name such as `tests::neon::foo`. */
export function jobDirName(jobName: string): string {
  return jobName.replace(/[^A-Za-z0-9_.-]+/g, '_');
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fsp.readFile(filePath, 'utf-8');
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
}

export class DockerSandbox implements ExecutionSandbox {
  private readonly run: CommandRunner;

  constructor(
    private readonly settings: SandboxSettings,
    private readonly options: DockerOptions,
  ) {
    this.run = options.run ?? spawnCommand;
  }

  async execute(request: SandboxRequest, signal: AbortSignal): Promise<SandboxResult> {
    const { artifact, jobName, runId } = request;
    const jobLog = log.child({ runId, jobName });

    if (artifact.pointer.kind === 'tarball') {
      await runDocker(this.run, { command: 'docker', args: ['load', '-i', artifact.pointer.uri] }, signal);
    }

    const outDir = path.join(this.options.workDir, runId, 'jobs', jobDirName(jobName));
    await fsp.mkdir(outDir, { recursive: true });

    const result = await this.run(
      {
        command: 'docker',
        args: [
          'build',
          '-o',
          outDir,
          '--build-arg',
          `test_name=${jobName}`,
          '-f',
          this.settings.dockerfile,
          this.settings.context,
        ],
        env: { DOCKER_BUILDKIT: '1', TEST_NAME: jobName },
      },
      signal,
    );

    const payload = await readIfExists(path.join(outDir, this.settings.coverageFile));
    jobLog.debug('Test image finished', { exitCode: result.exitCode, hasCoverage: payload !== undefined });

    return {
      passed: result.exitCode === 0,
      exitCode: result.exitCode,
      coverage: payload !== undefined ? { jobName, format: this.settings.coverageFormat, payload } : undefined,
      output: (result.stdout + result.stderr).slice(-4000),
    };
  }
}
