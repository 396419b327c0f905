/**
 * Builds the run's image with Docker and exports it as a tarball.
 *
 * One tarball per run, under `<workDir>/<runId>/image.tar`; jobs load it
 * back with `docker load`, and `cleanup` deletes it once the run is over.
 */

import { createHash } from 'crypto';
import { createReadStream, promises as fsp } from 'fs';
import path from 'path';
import { BuiltImage } from '../domain/artifact';
import { logger } from '../logger';
import { BuildRecipeExecutor, BuildRequest } from '../engine/collaborators';
import { CommandResult, CommandRunner, CommandSpec, formatCommand, spawnCommand } from './command';

const log = logger.child({ module: 'docker-builder' });

/** A docker command exited non-zero. */
export class DockerCommandError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string,
  ) {
    super(`${command} exited with code ${exitCode}`);
    this.name = 'DockerCommandError';
  }
}

export interface DockerOptions {
  workDir: string;
  run?: CommandRunner;
}

export async function runDocker(run: CommandRunner, spec: CommandSpec, signal: AbortSignal): Promise<CommandResult> {
  const result = await run(spec, signal);
  if (result.exitCode !== 0) {
    throw new DockerCommandError(formatCommand(spec), result.exitCode, result.stderr.slice(-2000));
  }
  return result;
}

export function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    createReadStream(filePath)
      .on('data', (chunk) => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolve(`sha256:${hash.digest('hex')}`));
  });
}

export class DockerImageBuilder implements BuildRecipeExecutor {
  private readonly run: CommandRunner;

  constructor(private readonly options: DockerOptions) {
    this.run = options.run ?? spawnCommand;
  }

  private tarballPath(runId: string): string {
    return path.join(this.options.workDir, runId, 'image.tar');
  }

  async build(request: BuildRequest, signal: AbortSignal): Promise<BuiltImage> {
    const { recipe, runId } = request;
    const runDir = path.join(this.options.workDir, runId);
    const tarball = this.tarballPath(runId);
    await fsp.mkdir(runDir, { recursive: true });

    const buildArgs = Object.entries(recipe.buildArgs ?? {}).flatMap(([key, value]) => ['--build-arg', `${key}=${value}`]);
    log.info('Building image', { runId, tag: recipe.tag, dockerfile: recipe.dockerfile });
    await runDocker(
      this.run,
      {
        command: 'docker',
        args: ['build', '-f', recipe.dockerfile, '-t', recipe.tag, ...buildArgs, recipe.context],
        env: { DOCKER_BUILDKIT: '1' },
      },
      signal,
    );

    await runDocker(this.run, { command: 'docker', args: ['save', '-o', tarball, recipe.tag] }, signal);

    const [contentHash, stat] = await Promise.all([hashFile(tarball), fsp.stat(tarball)]);
    log.info('Image exported', { runId, tarball, sizeBytes: stat.size });
    return {
      pointer: { kind: 'tarball', uri: tarball },
      contentHash,
      sizeBytes: stat.size,
    };
  }

  async cleanup(runId: string): Promise<void> {
    const tarball = this.tarballPath(runId);
    await fsp.rm(tarball, { force: true });
    log.debug('Image tarball removed', { runId, tarball });
  }
}
