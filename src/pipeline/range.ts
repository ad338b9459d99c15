import type { ClipPolicyKind } from './env';
import { InvalidRangeError } from './errors';
import type { ClipRange, Match } from './types';

export const DEFAULT_PADDING_SEC = 2.0;

export type ClipPolicy = { kind: 'exact' } | { kind: 'padded'; pad: number };

export interface ResolveOptions {
  /** Media length; a padded end is clamped to it when known. */
  durationSec?: number;
}

export function policyFromConfig(kind: ClipPolicyKind, pad = DEFAULT_PADDING_SEC): ClipPolicy {
  return kind === 'padded' ? { kind: 'padded', pad } : { kind: 'exact' };
}

/**
 * Clip range for a match. Start never goes below 0; a range that ends up
 * empty or inverted is rejected, not returned.
 */
export function resolveRange(
  match: Pick<Match, 'start' | 'end'>,
  policy: ClipPolicy,
  options: ResolveOptions = {}
): ClipRange {
  let start = match.start;
  let end = match.end;

  if (policy.kind === 'padded') {
    const pad = policy.pad;
    if (!Number.isFinite(pad) || pad < 0) {
      throw new InvalidRangeError(match.start, match.end, `padding must be a non-negative number, got ${pad}`);
    }
    start = Math.max(0, start - pad);
    end = end + pad;
    if (options.durationSec !== undefined && Number.isFinite(options.durationSec)) {
      end = Math.min(end, options.durationSec);
    }
  }

  start = Math.max(0, start);
  if (!Number.isFinite(start) || !Number.isFinite(end) || end <= start) {
    throw new InvalidRangeError(start, end, 'end must be after start');
  }
  return { start, end };
}
