/**
 * Duration Parsing
 *
 * Accepts plain milliseconds ("600000") or unit strings made of one or more
 * `<number><unit>` parts ("10m", "1h30m", "1.5s", "250ms"). Units: h, m, s, ms.
 */

const UNIT_MS: Record<string, number> = {
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
  ms: 1,
};

const PART_PATTERN = /(\d+(?:\.\d+)?)(ms|h|m|s)/g;
const FULL_PATTERN = /^(?:\d+(?:\.\d+)?(?:ms|h|m|s))+$/;

/**
 * Parse a duration to milliseconds.
 *
 * @returns milliseconds, or null when the value is empty, malformed or not positive
 */
export function parseDurationMs(value: string | undefined): number | null {
  const input = value?.trim();
  if (!input) {
    return null;
  }

  if (/^\d+$/.test(input)) {
    const ms = parseInt(input, 10);
    return ms > 0 ? ms : null;
  }

  if (!FULL_PATTERN.test(input)) {
    return null;
  }

  let total = 0;
  for (const match of input.matchAll(PART_PATTERN)) {
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
  }

  const ms = Math.round(total);
  return ms > 0 ? ms : null;
}
