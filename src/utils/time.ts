/**
 * UTC timestamp formats used in filenames and on screens
 */

const pad = (value: number): string => String(value).padStart(2, "0");

type UtcParts = {
  year: string;
  month: string;
  day: string;
  hours: string;
  minutes: string;
  seconds: string;
};

function utcParts(date: Date): UtcParts {
  return {
    year: String(date.getUTCFullYear()),
    month: pad(date.getUTCMonth() + 1),
    day: pad(date.getUTCDate()),
    hours: pad(date.getUTCHours()),
    minutes: pad(date.getUTCMinutes()),
    seconds: pad(date.getUTCSeconds()),
  };
}

/**
 * `2024-03-09 07:05:01 UTC`
 */
export function formatUtcDateTime(date: Date): string {
  const p = utcParts(date);
  return `${p.year}-${p.month}-${p.day} ${p.hours}:${p.minutes}:${p.seconds} UTC`;
}

/**
 * `07:05:01`
 */
export function formatUtcClock(date: Date): string {
  const p = utcParts(date);
  return `${p.hours}:${p.minutes}:${p.seconds}`;
}

/**
 * `20240309-070501`, used for canned screen filenames
 */
export function formatCompactStamp(date: Date): string {
  const p = utcParts(date);
  return `${p.year}${p.month}${p.day}-${p.hours}${p.minutes}${p.seconds}`;
}

/**
 * `2024-03-09-T07-05-01Z`, used for generated filenames
 */
export function formatFilenameStamp(date: Date): string {
  const p = utcParts(date);
  return `${p.year}-${p.month}-${p.day}-T${p.hours}-${p.minutes}-${p.seconds}Z`;
}
