/**
 * Policy spec parser
 *
 * Turns a policy string such as `h24d30w8m6y1` into a RetentionPolicySpec.
 * Each of the markers h, d, w, m, y takes the run of ASCII digits right after
 * it. Anything else is skipped, so the parser never fails: garbage in means
 * "retain nothing".
 */

import type { RetentionPeriod, RetentionPolicySpec } from './retention.interface';

const MARKERS: ReadonlyMap<string, RetentionPeriod> = new Map([
  ['h', 'hourly'],
  ['d', 'daily'],
  ['w', 'weekly'],
  ['m', 'monthly'],
  ['y', 'yearly'],
]);

// Counts are unsigned 32-bit; a longer digit run is ill-formed.
const MAX_COUNT = 0xffffffff;

function isAsciiDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function parsePolicySpec(spec: string): RetentionPolicySpec {
  const policy: RetentionPolicySpec = {};

  let i = 0;
  while (i < spec.length) {
    const period = MARKERS.get(spec[i]);
    i++;
    if (!period) {
      continue;
    }

    const start = i;
    while (i < spec.length && isAsciiDigit(spec[i])) {
      i++;
    }
    if (i === start) {
      continue;
    }

    const count = Number(spec.slice(start, i));
    if (count <= MAX_COUNT) {
      policy[period] = count;
    }
  }

  return policy;
}

/**
 * Canonical string form of a policy, for logs. Unset periods are left out.
 */
export function formatPolicySpec(policy: RetentionPolicySpec): string {
  return Array.from(MARKERS, ([marker, period]) => {
    const count = policy[period];
    return count === undefined ? '' : `${marker}${count}`;
  }).join('');
}
