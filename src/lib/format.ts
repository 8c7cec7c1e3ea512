const formatters = new Map<string, Intl.NumberFormat>();

function numberFormat(decimals: number, signed: boolean): Intl.NumberFormat {
  const key = `${decimals}:${signed}`;
  let formatter = formatters.get(key);
  if (!formatter) {
    // Exact halves round to even: 82.5 -> 82, 2.125 -> 2.12.
    const options = {
      minimumFractionDigits: decimals,
      maximumFractionDigits: decimals,
      signDisplay: signed ? "always" : "auto",
      roundingMode: "halfEven",
    } as const;
    formatter = new Intl.NumberFormat("en-US", options);
    formatters.set(key, formatter);
  }
  return formatter;
}

/**
 * Thousands-separated number with a fixed number of decimals.
 * Non-finite values render as 0.
 */
export function formatNumber(
  value: number,
  decimals = 0,
  signed = false
): string {
  return numberFormat(decimals, signed).format(
    Number.isFinite(value) ? value : 0
  );
}

export function formatCurrency(value: number, prefix: string): string {
  return `${prefix} ${formatNumber(value)}`;
}

export function formatPercent(
  value: number,
  decimals = 0,
  signed = false
): string {
  return `${formatNumber(value, decimals, signed)}%`;
}

const pad = (value: number) => String(value).padStart(2, "0");

/** `YYYY-MM-DD HH:mm` in local time. */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(
    date.getDate()
  )} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/** `YYYYMMDD_HHmm` in local time, for file names. */
export function formatFileTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(
    date.getDate()
  )}_${pad(date.getHours())}${pad(date.getMinutes())}`;
}
