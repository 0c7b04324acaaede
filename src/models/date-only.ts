/**
 * NAV Date fields carry no time and no zone. They are exchanged as
 * yyyy-MM-dd and held as a Date at UTC midnight.
 */

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a date as yyyy-MM-dd using its UTC calendar day.
 */
export function formatNavDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

/**
 * Parse yyyy-MM-dd (optionally followed by a time part) into a UTC-midnight
 * Date, or undefined when the text is not a valid calendar day.
 */
export function parseNavDate(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const match = DATE_ONLY.exec(value.trim());
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // setUTCFullYear keeps years below 100 as written (0001-01-01 is NAV's blank date)
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}
