/**
 * Uploads coverage reports to an HTTP endpoint.
 *
 * One POST per report, named after the job and tagged with its run, lane
 * and commit. Any non-2xx response or
 * transport error rejects with `CoverageSinkError`; nothing is retried.
 */

import { CoverageAck, CoverageReport } from '../domain/coverage';
import { maskSecretsInMessage, validationError } from '../domain/errors';
import { ConfigError } from '../config/pipeline-config';
import { CoverageSink, CoverageSinkError } from '../engine/collaborators';
import { logger } from '../logger';

const log = logger.child({ module: 'http-coverage-sink' });

const UPLOAD_TIMEOUT_MS = 30_000;

export interface CoverageUploadBody {
  name: string;
  format: string;
  report: string;
  runId?: string;
  lane?: string;
  sha?: string;
}

/** Delivery function type (injectable for testing). */
export type CoverageDeliveryFn = (
  url: string,
  body: CoverageUploadBody,
  headers: Record<string, string>,
) => Promise<{ statusCode: number; body: string }>;

/** POST using native fetch. */
export const fetchDelivery: CoverageDeliveryFn = async (url, body, headers) => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), UPLOAD_TIMEOUT_MS);
  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
    return { statusCode: response.status, body: await response.text() };
  } finally {
    clearTimeout(timeout);
  }
};

/** Pull an upload reference out of a JSON response, if there is one. */
export function parseReference(body: string): string | undefined {
  if (!body) return undefined;
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'reference' in parsed && typeof parsed.reference === 'string') {
      return parsed.reference;
    }
  } catch (err) {
    log.debug('Upload response is not JSON', { error: err instanceof Error ? err.message : String(err) });
  }
  return undefined;
}

export interface HttpCoverageSinkOptions {
  url: string;
  token?: string;
  delivery?: CoverageDeliveryFn;
}

export class HttpCoverageSink implements CoverageSink {
  private readonly delivery: CoverageDeliveryFn;

  constructor(private readonly options: HttpCoverageSinkOptions) {
    let parsed: URL;
    try {
      parsed = new URL(options.url);
    } catch {
      throw new ConfigError(validationError(`Invalid coverage upload URL: ${options.url}`));
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ConfigError(
        validationError(`Coverage upload URL must use http or https protocol, got: ${parsed.protocol}`),
      );
    }
    this.delivery = options.delivery ?? fetchDelivery;
  }

  async upload(report: CoverageReport): Promise<CoverageAck> {
    const headers: Record<string, string> = { 'User-Agent': 'matrix-fanout/0.1.0' };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    const secrets = this.options.token ? [this.options.token] : [];

    let response: { statusCode: number; body: string };
    try {
      response = await this.delivery(
        this.options.url,
        {
          name: report.jobName,
          format: report.format,
          report: report.payload,
          ...(report.runId !== undefined ? { runId: report.runId } : {}),
          ...(report.lane !== undefined ? { lane: report.lane } : {}),
          ...(report.sha !== undefined ? { sha: report.sha } : {}),
        },
        headers,
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CoverageSinkError(maskSecretsInMessage(message, secrets));
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new CoverageSinkError(`Coverage service returned HTTP ${response.statusCode}`, response.statusCode);
    }

    return {
      jobName: report.jobName,
      reference: parseReference(response.body),
      acceptedAt: new Date().toISOString(),
    };
  }
}
