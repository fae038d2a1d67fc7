const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const MONTH_DAY_YEAR_REGEX = /^([A-Za-z]{3})\s+(\d{1,2})\s+(\d{4})$/;
const DAY_MONTH_YEAR_REGEX = /^(\d{1,2})\s+([A-Za-z]{3})\s+(\d{4})$/;
const DAY_MONTH_YEAR_DASH_REGEX = /^(\d{1,2})-(\d{1,2})-(\d{4})$/;
const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
const AMOUNT_REGEX = /^([+-])?(\d+)(?:\.(\d{1,2}))?$/;
const WHOLE_NUMBER_REGEX = /^\d+$/;

export type Direction = "add" | "remove";

// UTC midnight of the given day; rejects days that do not exist (Feb 30).
export function calendarDate(
  year: number,
  month: number,
  day: number,
  input: string
): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new Error(`invalid date "${input}"`);
  }
  return date;
}

function monthNumber(name: string, input: string): number {
  const month = MONTHS[name.toLowerCase()];
  if (month === undefined) {
    throw new Error(`invalid date "${input}"`);
  }
  return month;
}

// "Oct 1 2019"
export function parseDateMonthDayYear(input: string): Date {
  const match = input.trim().match(MONTH_DAY_YEAR_REGEX);
  if (!match) {
    throw new Error(`invalid date "${input}"`);
  }
  const [, month, day, year] = match;
  return calendarDate(Number(year), monthNumber(month, input), Number(day), input);
}

// "1 Oct 2019"
export function parseDateDayMonthYear(input: string): Date {
  const match = input.trim().match(DAY_MONTH_YEAR_REGEX);
  if (!match) {
    throw new Error(`invalid date "${input}"`);
  }
  const [, day, month, year] = match;
  return calendarDate(Number(year), monthNumber(month, input), Number(day), input);
}

// "01-10-2019"
export function parseDateDashed(input: string): Date {
  const match = input.trim().match(DAY_MONTH_YEAR_DASH_REGEX);
  if (!match) {
    throw new Error(`invalid date "${input}"`);
  }
  const [, day, month, year] = match;
  return calendarDate(Number(year), Number(month), Number(day), input);
}

export function parseDateISO(input: string): Date {
  const match = input.trim().match(ISO_DATE_REGEX);
  if (!match) {
    throw new Error(`invalid date "${input}"`);
  }
  const [, year, month, day] = match;
  return calendarDate(Number(year), Number(month), Number(day), input);
}

export function formatDateISO(date: Date): string {
  const year = `${date.getUTCFullYear()}`.padStart(4, "0");
  const month = `${date.getUTCMonth() + 1}`.padStart(2, "0");
  const day = `${date.getUTCDate()}`.padStart(2, "0");
  return `${year}-${month}-${day}`;
}

// Plain decimal with at most two fractional digits, computed in cents.
export function parseAmount(input: string, { signed }: { signed: boolean }): number {
  const match = input.trim().match(AMOUNT_REGEX);
  if (!match || (match[1] !== undefined && !signed)) {
    throw new Error(`invalid amount "${input}"`);
  }
  const [, sign, whole, fraction = ""] = match;
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, "0"));
  if (!Number.isSafeInteger(cents)) {
    throw new Error(`invalid amount "${input}"`);
  }
  if (cents === 0) return 0;
  return sign === "-" ? -cents / 100 : cents / 100;
}

export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}

export function parseWholeNumber(input: string, label: string, max?: number): number {
  const trimmed = input.trim();
  const value = Number(trimmed);
  if (
    !WHOLE_NUMBER_REGEX.test(trimmed) ||
    !Number.isSafeInteger(value) ||
    (max !== undefined && value > max)
  ) {
    throw new Error(`invalid ${label} "${input}"`);
  }
  return value;
}

export function parseDirection(input: string): Direction {
  const value = input.trim();
  if (value === "add" || value === "remove") {
    return value;
  }
  throw new Error(`invalid type "${input}" (expected add or remove)`);
}

// Debits come out negative, credits positive.
export function applyDirection(amount: number, direction: Direction): number {
  const magnitude = Math.abs(amount);
  if (magnitude === 0) return 0;
  return direction === "remove" ? -magnitude : magnitude;
}
