export function formatCurrency(amount: number, currency = "USD"): string {
  return new Intl.NumberFormat("en-US", {
    style: "currency",
    currency,
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
  }).format(amount);
}

export function formatNumber(num: number, maximumFractionDigits = 0): string {
  return new Intl.NumberFormat("en-US", { maximumFractionDigits }).format(num);
}

export function formatPercentage(num: number): string {
  return `${num.toFixed(1)}%`;
}

/**
 * Percentage change from `previous` to `current`.
 *
 * @returns null when `previous` is 0 or the rate overflows
 */
export function calculatePercentageChange(
  current: number,
  previous: number,
): number | null {
  if (previous === 0) return null;
  const change = ((current - previous) / previous) * 100;
  return Number.isFinite(change) ? change : null;
}

/**
 * Format a date as its UTC calendar day ("2024-01-17")
 */
export function formatDay(date: Date): string {
  return date.toISOString().split("T")[0];
}

/**
 * Safely parse a timestamp that could be:
 * - Date object
 * - ISO 8601 string ("2024-01-17T14:30:45+00:00")
 * - Unix timestamp in seconds (1705502445)
 * - Unix timestamp in milliseconds (1705502445000)
 * - undefined/null
 *
 * @returns timestamp in milliseconds, or null if invalid
 */
export function parseTimestamp(
  timestamp: string | number | Date | null | undefined,
): number | null {
  if (timestamp == null || timestamp === "") {
    return null;
  }

  let ms: number;

  if (timestamp instanceof Date) {
    ms = timestamp.getTime();
  } else if (typeof timestamp === "string") {
    // Numeric strings are unix timestamps
    if (/^\d+$/.test(timestamp)) {
      ms = toMilliseconds(Number(timestamp));
    } else {
      ms = new Date(timestamp).getTime();
    }
  } else {
    ms = toMilliseconds(timestamp);
  }

  if (isNaN(ms) || ms <= 0) {
    return null;
  }

  return ms;
}

// Timestamps before 2001 in ms would be < 1e12, so smaller values are seconds
function toMilliseconds(value: number): number {
  return value < 1e12 ? value * 1000 : value;
}
