// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Number, size and time formatting for reports and listings.
 */

const THOUSAND = 1_000;
const MILLION = THOUSAND * 1_000;
const BILLION = MILLION * 1_000;
const TRILLION = BILLION * 1_000;

function withDecimals(value: number, decimals: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(decimals);
}

/**
 * Format a parameter count with a K/M/B/T suffix.
 *
 * @example formatParameterCount(133_700_000) // "133.70M"
 * @example formatParameterCount(7_000_000_000) // "7B"
 */
export function formatParameterCount(count: number): string {
  const n = Math.max(0, Math.trunc(count));

  if (n >= TRILLION) return withDecimals(n / TRILLION, 1) + 'T';
  if (n >= BILLION) return withDecimals(n / BILLION, 1) + 'B';
  if (n >= MILLION) return withDecimals(n / MILLION, 2) + 'M';
  if (n >= THOUSAND) return (n / THOUSAND).toFixed(0) + 'K';
  return String(n);
}

/**
 * Plain decimal notation, never exponent form.
 */
export function formatPlainNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return formatNumber(value);
  }
  const text = String(value);
  if (!text.includes('e')) {
    return text;
  }
  if (Number.isInteger(value)) {
    return BigInt(value).toString();
  }
  return value.toFixed(20).replace(/0+$/, '');
}

/**
 * Shortest representation that round-trips, switching to exponent form
 * when the decimal exponent is below -4 or at least 6.
 *
 * @example formatNumber(8e9) // "8e+09"
 * @example formatNumber(11434) // "11434"
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  if (Object.is(value, -0)) return '-0';
  if (value === 0) return '0';

  const [mantissa, exponentText] = value.toExponential().split('e');
  const exponent = Number(exponentText);
  if (exponent < -4 || exponent >= 6) {
    const sign = exponent < 0 ? '-' : '+';
    return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
  }
  return formatPlainNumber(value);
}

const KILOBYTE = 1_000;
const MEGABYTE = KILOBYTE * 1_000;
const GIGABYTE = MEGABYTE * 1_000;
const TERABYTE = GIGABYTE * 1_000;

/**
 * Format a byte count with decimal units.
 *
 * @example formatBytes(1024) // "1.0 KB"
 */
export function formatBytes(bytes: number): string {
  let value: number;
  let unit: string;

  if (bytes >= TERABYTE) {
    value = bytes / TERABYTE;
    unit = 'TB';
  } else if (bytes >= GIGABYTE) {
    value = bytes / GIGABYTE;
    unit = 'GB';
  } else if (bytes >= MEGABYTE) {
    value = bytes / MEGABYTE;
    unit = 'MB';
  } else if (bytes >= KILOBYTE) {
    value = bytes / KILOBYTE;
    unit = 'KB';
  } else {
    return `${Math.trunc(bytes)} B`;
  }

  if (value >= 10) {
    return `${Math.trunc(value)} ${unit}`;
  }
  if (!Number.isInteger(value)) {
    return `${value.toFixed(1)} ${unit}`;
  }
  return `${value} ${unit}`;
}

const SECOND_MS = 1_000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;

function formatDuration(ms: number): string {
  const seconds = Math.trunc(ms / SECOND_MS);
  if (seconds < 1) return 'Less than a second';
  if (seconds === 1) return '1 second';
  if (seconds < 60) return `${seconds} seconds`;

  const minutes = Math.trunc(ms / MINUTE_MS);
  if (minutes === 1) return 'About a minute';
  if (minutes < 60) return `${minutes} minutes`;

  const hours = Math.round(ms / HOUR_MS);
  if (hours === 1) return 'About an hour';
  if (hours < 48) return `${hours} hours`;
  if (hours < 24 * 7 * 2) return `${Math.trunc(hours / 24)} days`;
  if (hours < 24 * 30 * 2) return `${Math.trunc(hours / (24 * 7))} weeks`;
  if (hours < 24 * 365 * 2) return `${Math.trunc(hours / (24 * 30))} months`;

  return `${Math.trunc(Math.trunc(ms / HOUR_MS) / (24 * 365))} years`;
}

/**
 * Describe a timestamp relative to now, e.g. "24 hours ago" or "2 days ago".
 */
export function formatRelativeTime(date: Date, now: Date = new Date(), never = 'Never'): string {
  const time = date.getTime();
  if (Number.isNaN(time) || time <= 0) {
    return never;
  }

  const delta = now.getTime() - time;
  if (Math.trunc(Math.trunc(delta / HOUR_MS) / (24 * 365)) < -20) {
    return 'Forever';
  }
  if (delta < 0) {
    return `${formatDuration(-delta)} from now`;
  }
  return `${formatDuration(delta)} ago`;
}
