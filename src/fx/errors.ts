/**
 * FX error taxonomy.
 *
 * - `RateSourceUnavailableError`: every per-base rate request failed. Carried
 *   inside a failed `RateTableResult`; callers show a retryable message.
 * - `RateSourceResponseError`: one request returned a bad status or body.
 *   Counts as a failure for that base only.
 * - `MalformedRateMapError`: a rate map breaks the self-pair or positivity
 *   invariant. This is a pinning bug and is always thrown.
 */

export class RateSourceUnavailableError extends Error {
  /** Bases that were attempted. */
  public readonly bases: readonly string[];
  public readonly as_of_date: string | undefined;
  /** One reason per failed base, in attempt order. */
  public readonly reasons: readonly string[];

  constructor(bases: readonly string[], asOfDate: string | undefined, reasons: readonly string[]) {
    const when = asOfDate ?? 'latest';
    const detail = reasons.length > 0 ? `: ${reasons.join('; ')}` : '';
    super(`Exchange rates unavailable for ${when}${detail}`);
    this.name = 'RateSourceUnavailableError';
    this.bases = [...bases];
    this.as_of_date = asOfDate;
    this.reasons = [...reasons];
  }
}

export class RateSourceResponseError extends Error {
  public readonly source: string;
  public readonly status: number | undefined;

  constructor(source: string, message: string, status?: number) {
    super(`${source}: ${message}`);
    this.name = 'RateSourceResponseError';
    this.source = source;
    this.status = status;
  }
}

export class MalformedRateMapError extends Error {
  public readonly as_of_date: string;

  constructor(asOfDate: string, message: string) {
    super(`Malformed rate map for ${asOfDate}: ${message}`);
    this.name = 'MalformedRateMapError';
    this.as_of_date = asOfDate;
  }
}

/** Render an unknown thrown value for logs and failure reasons. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
