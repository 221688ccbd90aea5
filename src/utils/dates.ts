const HOUR_MS = 60 * 60 * 1000;

const MONTH_ABBREVIATIONS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec'
];

const DATE_TIME_REGEX = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/;

export const INVALID_DATE_MESSAGE = 'Invalid date format. Please use YYYY-MM-DD HH:MM format.';

const pad = (value: number): string => String(value).padStart(2, '0');

const toDate = (value: string | Date): Date | null => {
  const parsed = typeof value === 'string' ? new Date(value) : value;
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};

/**
 * Parses `YYYY-MM-DD HH:MM` as local time. Rejects dates that do not exist
 * (2026-02-30) instead of letting `Date` roll them over.
 */
export const parseDateTimeInput = (value: string): Date | null => {
  const match = value.trim().match(DATE_TIME_REGEX);
  if (!match) {
    return null;
  }
  const [year, month, day, hour, minute] = match.slice(1).map(Number);
  if (hour > 23 || minute > 59) {
    return null;
  }
  const date = new Date(year, month - 1, day, hour, minute);
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return null;
  }
  return date;
};

export const combineDateAndTime = (date: string, time: string): Date | null =>
  parseDateTimeInput(`${date} ${time}`);

export const formatDateTime = (value?: string | Date | null): string => {
  if (!value) {
    return 'N/A';
  }
  const date = toDate(value);
  if (!date) {
    return 'N/A';
  }
  return `${toDateInputValue(date)} ${toTimeInputValue(date)}`;
};

export const toDateInputValue = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

export const toTimeInputValue = (date: Date): string =>
  `${pad(date.getHours())}:${pad(date.getMinutes())}`;

export const formatMonthDay = (date: Date): string =>
  `${pad(date.getMonth() + 1)}/${pad(date.getDate())}`;

export const formatMonthYear = (date: Date): string =>
  `${MONTH_ABBREVIATIONS[date.getMonth()]} ${date.getFullYear()}`;

export const addHours = (date: Date, hours: number): Date =>
  new Date(date.getTime() + hours * HOUR_MS);

export const addDays = (date: Date, days: number): Date => {
  const next = new Date(date.getTime());
  next.setDate(next.getDate() + days);
  return next;
};

const daysInMonth = (year: number, month: number): number => new Date(year, month + 1, 0).getDate();

/** Shifts by calendar months, clamping to the last day of a shorter target month. */
export const addMonths = (date: Date, months: number): Date => {
  const next = new Date(date.getTime());
  const day = next.getDate();
  next.setDate(1);
  next.setMonth(next.getMonth() + months);
  next.setDate(Math.min(day, daysInMonth(next.getFullYear(), next.getMonth())));
  return next;
};

/** Half-hour slots for the reminder time pickers: 00:00, 00:30 ... 23:30. */
export const HALF_HOUR_SLOTS: string[] = Array.from({ length: 48 }, (_, index) =>
  `${pad(Math.floor(index / 2))}:${index % 2 === 0 ? '00' : '30'}`
);

/** The half-hour slots plus `current` when it falls between them, in time order. */
export const timeOptions = (current: string): string[] =>
  current === '' || HALF_HOUR_SLOTS.includes(current)
    ? HALF_HOUR_SLOTS
    : [...HALF_HOUR_SLOTS, current].sort();
