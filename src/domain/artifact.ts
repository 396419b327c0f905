/**
 * Artifact domain model.
 *
 * The build stage produces exactly one artifact per run. Artifacts are
 * referenced by storage pointers rather than embedded payloads, and are
 * immutable once published.
 */

/** Artifact storage pointer kinds. */
export type ArtifactPointerKind = 'tarball' | 'image' | 'inline';

/** Storage pointer for artifact location. */
export interface ArtifactPointer {
  kind: ArtifactPointerKind;
  /** Tarball path, image reference, or inline content. */
  uri: string;
}

/** What a build recipe executor hands back on success. */
export interface BuiltImage {
  pointer: ArtifactPointer;
  contentHash?: string;
  sizeBytes?: number;
}

/** Input to `ArtifactStore.publish`. A failed build never yields a handle. */
export type BuildOutput =
  | { status: 'succeeded'; image: BuiltImage }
  | { status: 'failed'; message: string; details?: Record<string, unknown> };

/** Opaque reference job executors use to fetch the run's artifact. */
export interface ArtifactHandle {
  artifactId: string;
  runId: string;
}

/** A published build artifact. */
export interface Artifact {
  id: string;
  runId: string;
  pointer: ArtifactPointer;
  contentHash?: string;
  sizeBytes?: number;
  publishedAt: string;
}
