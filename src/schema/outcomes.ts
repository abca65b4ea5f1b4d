// ── Fetch outcomes ──────────────────────────────────────────

export type FetchOutcome =
  | { state: string; status: 'saved'; path: string }
  | { state: string; status: 'no-link' }
  | { state: string; status: 'download-failed'; httpStatus: number }
  | { state: string; status: 'error'; message: string };

export type FetchStatus = FetchOutcome['status'];

// ── Conversion outcomes ─────────────────────────────────────

export type ConversionOutcome =
  | { source: string; status: 'written'; path: string; rows: number }
  | { source: string; status: 'no-header' }
  | { source: string; status: 'no-rows' };

export type ConversionStatus = ConversionOutcome['status'];

export function tally<S extends string>(
  outcomes: readonly { status: S }[],
): Partial<Record<S, number>> {
  const counts: Partial<Record<S, number>> = {};
  for (const o of outcomes) {
    counts[o.status] = (counts[o.status] ?? 0) + 1;
  }
  return counts;
}
