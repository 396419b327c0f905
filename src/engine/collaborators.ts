/**
 * Boundary collaborators the engine drives but does not implement.
 *
 * Docker-backed implementations live in `src/integrations`; tests supply
 * in-process fakes.
 */

import { Artifact, BuiltImage } from '../domain/artifact';
import { CoverageAck, CoverageReport } from '../domain/coverage';

/** How to build the run's image. */
export interface BuildRecipe {
  /** Dockerfile path, relative to `context`. */
  dockerfile: string;
  /** Build context directory. */
  context: string;
  /** Image tag to build and export. */
  tag: string;
  buildArgs?: Record<string, string>;
}

export interface BuildRequest {
  runId: string;
  recipe: BuildRecipe;
}

/** Produces the run's artifact. Rejects when the build fails. */
export interface BuildRecipeExecutor {
  build(request: BuildRequest, signal: AbortSignal): Promise<BuiltImage>;
  /** Release whatever `build` left behind for the run, once it is terminal. */
  cleanup?(runId: string): Promise<void>;
}

export interface SandboxRequest {
  runId: string;
  jobName: string;
  group: string;
  timeoutMs: number;
  artifact: Artifact;
}

export interface SandboxResult {
  /** The test unit's own verdict. */
  passed: boolean;
  exitCode?: number;
  /** Coverage extracted from the environment; a failing test may still have one. */
  coverage?: CoverageReport;
  /** Tail of the test output, for logs. */
  output?: string;
}

/**
 * Runs one named test unit against the artifact in isolation. Rejects when
 * the environment itself crashes. Implementations should stop work when
 * `signal` aborts.
 */
export interface ExecutionSandbox {
  execute(request: SandboxRequest, signal: AbortSignal): Promise<SandboxResult>;
}

/** External coverage service. Rejects on any upload failure. */
export interface CoverageSink {
  upload(report: CoverageReport): Promise<CoverageAck>;
}

/** Thrown by sinks; `statusCode` is set for HTTP failures. */
export class CoverageSinkError extends Error {
  constructor(message: string, public readonly statusCode?: number) {
    super(message);
    this.name = 'CoverageSinkError';
  }
}
