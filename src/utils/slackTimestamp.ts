/**
 * Slack `ts` values ("1700000000.000100") are stored as DECIMAL(16, 6).
 *
 * They stay strings end to end: a double cannot hold 16 significant digits
 * reliably, so comparison works on the scaled integer instead.
 */
const SLACK_TS_PATTERN = /^(\d{1,10})(?:\.(\d{1,6}))?$/;

export function isSlackTimestamp(value: string): boolean {
  return SLACK_TS_PATTERN.test(value);
}

/** Pads the fraction to six digits, the form Postgres returns for NUMERIC(16, 6). */
export function normalizeSlackTimestamp(value: string): string {
  const match = SLACK_TS_PATTERN.exec(value);

  if (!match) {
    throw new Error(`Invalid Slack timestamp: ${value}`);
  }

  const seconds = (match[1] ?? "0").replace(/^0+(?=\d)/, "");
  const fraction = (match[2] ?? "").padEnd(6, "0");

  return `${seconds}.${fraction}`;
}

function toMicros(value: string): bigint {
  return BigInt(normalizeSlackTimestamp(value).replace(".", ""));
}

export function compareSlackTimestamps(a: string, b: string): number {
  const left = toMicros(a);
  const right = toMicros(b);

  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

export function slackTimestampToDate(value: string): Date {
  return new Date(Number(toMicros(value) / 1000n));
}
