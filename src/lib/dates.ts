const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface DateWindow {
  start: Date;
  end: Date;
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Parse date string in "DD-MM-YYYY" format as UTC midnight.
 * @returns Date object | null
 */
export const parseDate = (dateStr: string): Date | null => {
  const match = /^(\d{2})-(\d{2})-(\d{4})$/.exec(dateStr.trim());
  if (!match) return null;

  const [day, month, year] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));

  // Date.UTC rolls 31-02 over into March
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) {
    return null;
  }
  return date;
};

export const formatDate = (date: Date): string =>
  `${pad(date.getUTCDate())}-${pad(date.getUTCMonth() + 1)}-${date.getUTCFullYear()}`;

export const addDays = (date: Date, days: number): Date =>
  new Date(date.getTime() + days * MS_PER_DAY);

/**
 * Splits [start, end) into consecutive windows of `days` days.
 * The last window is clamped to `end`.
 */
export function* dateWindows(
  start: Date,
  end: Date,
  days: number
): Generator<DateWindow, void, undefined> {
  let current = start;
  while (current < end) {
    const next = addDays(current, days);
    yield { start: current, end: next < end ? next : end };
    current = next;
  }
}

export const formatWindow = ({ start, end }: DateWindow): string =>
  `${formatDate(start)} to ${formatDate(end)}`;

/** e.g. "21-01-2021 11-12-13 AM.log", in local time. */
export const logFileName = (now: Date): string => {
  const hours = now.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const meridiem = hours < 12 ? 'AM' : 'PM';
  const date = `${pad(now.getDate())}-${pad(now.getMonth() + 1)}-${now.getFullYear()}`;
  const time = `${pad(hour12)}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  return `${date} ${time} ${meridiem}.log`;
};
