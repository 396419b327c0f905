/**
 * Typed error model for machine-actionable error handling.
 *
 * Pipeline failures are recorded on runs and job results as typed errors
 * rather than free-form strings, so API consumers can branch on `code`.
 */

/** Typed suggested fix that agents can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and events. */
export interface TypedError {
  /** Namespaced error code (e.g., "JOB.TIMEOUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated run if applicable. */
  runId?: string;
  /** Associated matrix job if applicable. */
  jobName?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  runId?: string;
  jobName?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    runId: params.runId,
    jobName: params.jobName,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Anything thrown by this library that carries a typed error. */
export interface TypedErrorCarrier {
  typedError: TypedError;
}

export function hasTypedError(err: unknown): err is TypedErrorCarrier {
  if (typeof err !== 'object' || err === null || !('typedError' in err)) return false;
  const candidate = err.typedError;
  return typeof candidate === 'object' && candidate !== null && 'code' in candidate;
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function duplicateJobError(jobName: string, groups: string[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.DUPLICATE_JOB',
    message: `Job "${jobName}" is declared more than once`,
    jobName,
    retryable: false,
    details: { groups },
    suggestedFixes: [
      { type: 'REMOVE_DUPLICATE', params: { jobName }, description: 'Job names must be unique across all matrix groups' },
    ],
  });
}

// --- RUN ---

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
    retryable: false,
  });
}

export function runSupersededError(runId: string, supersededBy: string): TypedError {
  return createTypedError({
    code: 'RUN.SUPERSEDED',
    message: `Run superseded by ${supersededBy}`,
    runId,
    retryable: false,
    details: { supersededBy },
  });
}

export function runJobsFailedError(runId: string, failedJobs: string[], reportingFailures: string[] = []): TypedError {
  const parts: string[] = [];
  if (failedJobs.length > 0) parts.push(`${failedJobs.length} job(s) did not pass: ${failedJobs.join(', ')}`);
  if (reportingFailures.length > 0) parts.push(`coverage reporting failed for: ${reportingFailures.join(', ')}`);
  return createTypedError({
    code: 'RUN.JOBS_FAILED',
    message: parts.join('; '),
    runId,
    retryable: false,
    details: { failedJobs, reportingFailures },
  });
}

export function runNotAdmittedError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_ADMITTED',
    message: `Run ${runId} holds no admission; create runs through the orchestrator`,
    runId,
    retryable: false,
  });
}

export function runAlreadyExecutingError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.ALREADY_RUNNING',
    message: `Run "${runId}" is already being executed`,
    runId,
    retryable: false,
  });
}

export function triggerNotAdmittedError(kind: string, allowed: string[]): TypedError {
  return createTypedError({
    code: 'TRIGGER.NOT_ADMITTED',
    message: `Trigger kind "${kind}" does not start runs`,
    retryable: false,
    details: { kind, allowed },
  });
}

// --- BUILD / ARTIFACT ---

export function buildFailureError(runId: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'BUILD.FAILED',
    message: `Build failed: ${message}`,
    runId,
    retryable: false,
    details,
    suggestedFixes: [
      { type: 'INSPECT_BUILD_LOG', params: { runId }, description: 'No job runs without a published artifact' },
    ],
  });
}

export function artifactNotFoundError(artifactId: string, runId?: string): TypedError {
  return createTypedError({
    code: 'ARTIFACT.NOT_FOUND',
    message: `Artifact not found: ${artifactId}`,
    runId,
    retryable: false,
  });
}

export function artifactAlreadyPublishedError(runId: string, artifactId: string): TypedError {
  return createTypedError({
    code: 'ARTIFACT.ALREADY_PUBLISHED',
    message: `Run ${runId} already published artifact ${artifactId}`,
    runId,
    retryable: false,
    details: { artifactId },
  });
}

// --- JOB ---

export function jobTimeoutError(runId: string, jobName: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'JOB.TIMEOUT',
    message: `Job exceeded timeout of ${timeoutMs}ms`,
    runId,
    jobName,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 1.5 } },
    ],
  });
}

export function jobCancelledError(runId: string, jobName: string, reason?: string): TypedError {
  return createTypedError({
    code: 'JOB.CANCELLED',
    message: reason ? `Job cancelled: ${reason}` : 'Job cancelled',
    runId,
    jobName,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

export function jobExecutionError(runId: string, jobName: string, message: string): TypedError {
  return createTypedError({
    code: 'JOB.EXECUTION_FAILED',
    message,
    runId,
    jobName,
    retryable: false,
  });
}

export function jobTestFailedError(runId: string, jobName: string, exitCode?: number): TypedError {
  return createTypedError({
    code: 'JOB.TEST_FAILED',
    message: exitCode !== undefined ? `Test exited with code ${exitCode}` : 'Test failed',
    runId,
    jobName,
    retryable: false,
    details: exitCode !== undefined ? { exitCode } : undefined,
  });
}

// --- COVERAGE ---

export function reportingFailureError(jobName: string, message: string, statusCode?: number): TypedError {
  return createTypedError({
    code: 'COVERAGE.REPORTING_FAILED',
    message: `Coverage upload failed for ${jobName}: ${message}`,
    jobName,
    retryable: statusCode === undefined || statusCode >= 500,
    details: statusCode !== undefined ? { statusCode } : undefined,
    suggestedFixes: [
      { type: 'CHECK_COVERAGE_SINK', params: {}, description: 'Coverage reporting failures fail the run' },
    ],
  });
}

export function coverageMissingError(jobName: string): TypedError {
  return createTypedError({
    code: 'COVERAGE.MISSING',
    message: `Job ${jobName} passed without producing a coverage report`,
    jobName,
    retryable: false,
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of each secret in `message` with its masked form.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join: secrets may contain regex metacharacters
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
