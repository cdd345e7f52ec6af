import ms from 'ms';

export class InvalidDurationError extends Error {
  constructor(
    readonly value: string,
    options?: { cause?: unknown },
  ) {
    super(`Invalid duration: "${value}"`, options);
    this.name = 'InvalidDurationError';
  }
}

// One `<amount><unit>` segment of a compound duration such as "2h45m30s".
const segmentPattern = /(\d+(?:\.\d+)?|\.\d+)(ns|us|µs|ms|h|m|s)/y;

const subMillisecondUnits: Readonly<Record<string, number>> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
};

function parseCompound(value: string): number | undefined {
  const negative = value.startsWith('-');
  const body = negative || value.startsWith('+') ? value.slice(1) : value;
  const pattern = new RegExp(segmentPattern.source, 'y');

  let total = 0;
  let position = 0;
  while (position < body.length) {
    pattern.lastIndex = position;
    const match = pattern.exec(body);
    if (!match) return undefined;

    const [, amount, unit] = match;
    total +=
      unit in subMillisecondUnits
        ? Number(amount) * subMillisecondUnits[unit]
        : ms(`${amount}${unit}`);
    position = pattern.lastIndex;
  }

  if (position === 0) return undefined;
  return negative ? -total : total;
}

/**
 * Parses a duration string into milliseconds. Accepts single units such as
 * `"8h"`, `"30m"` or `"7d"`, and compound sequences such as `"1h30m"` or
 * `"2h45m30s"` (units h, m, s, ms, us, ns).
 *
 * Zero is only accepted with `allowZero`, where callers use it to mean
 * "never expires".
 */
export function parseDuration(
  value: string,
  options: { allowZero?: boolean } = {},
): number {
  let parsed: number | undefined;
  try {
    parsed = ms(value);
  } catch (error) {
    throw new InvalidDurationError(value, { cause: error });
  }

  if (typeof parsed !== 'number' || Number.isNaN(parsed)) {
    parsed = parseCompound(value);
  }

  return assertDuration(parsed, value, options);
}

/**
 * Checks a millisecond duration against the same rules as parseDuration.
 */
export function assertDuration(
  durationMs: number | undefined,
  label: string,
  options: { allowZero?: boolean } = {},
): number {
  if (typeof durationMs !== 'number' || !Number.isFinite(durationMs)) {
    throw new InvalidDurationError(label);
  }
  if (durationMs < 0 || (durationMs === 0 && !options.allowZero)) {
    throw new InvalidDurationError(label);
  }
  return durationMs;
}
