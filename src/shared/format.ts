const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const NS_PER_MS = 1_000_000;
const NS_PER_SECOND = 1_000_000_000;

export function basename(file: string): string {
  const parts = file.split(/[\\/]/).filter(Boolean);
  return parts[parts.length - 1] ?? file;
}

/** e.g. `Jan 2, 2006 at 3:04pm (UTC)` */
export function formatProfileTime(timeNanos: number): string {
  const n = typeof timeNanos === 'number' && isFinite(timeNanos) ? timeNanos : 0;
  const date = new Date(Math.floor(n / NS_PER_MS));
  const hours = date.getUTCHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  const meridiem = hours < 12 ? 'am' : 'pm';
  return (
    `${MONTHS[date.getUTCMonth()]} ${date.getUTCDate()}, ${date.getUTCFullYear()} ` +
    `at ${hour12}:${minutes}${meridiem} (UTC)`
  );
}

export function formatProfileDuration(durationNanos: number): string {
  const n = typeof durationNanos === 'number' && isFinite(durationNanos) ? Math.max(0, Math.floor(durationNanos)) : 0;
  if (n > NS_PER_SECOND) {
    return `${(n / NS_PER_SECOND).toFixed(6)} s`;
  }
  return `${n} ns`;
}

export function displayUnit(unit: string): string {
  return unit === 'nanoseconds' ? 'seconds' : unit;
}

export type LegendInput = {
  file?: string;
  type: string;
  unit: string;
  timeNanos: number;
  durationNanos: number;
};

export function buildLegend(input: LegendInput): string[] {
  return [
    `File: ${input.file ? basename(input.file) : 'unknown'}`,
    `Type: ${input.type}`,
    `Unit: ${displayUnit(input.unit)}`,
    `Time: ${formatProfileTime(input.timeNanos)}`,
    `Duration: ${formatProfileDuration(input.durationNanos)}`
  ];
}
