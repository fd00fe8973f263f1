/**
 * Business-date helpers. A business date is a `YYYY-MM-DD` string of the calendar
 * day at a fixed UTC offset (minutes), e.g. 420 for Asia/Ho_Chi_Minh.
 */

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;
const BUSINESS_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export type BusinessDate = string;

export interface DateRange {
  start: Date; // inclusive
  end: Date; // exclusive
}

export interface BusinessPeriod {
  start: BusinessDate;
  end: BusinessDate; // inclusive
}

const parseBusinessDate = (day: BusinessDate): number => {
  const match = BUSINESS_DATE_PATTERN.exec(day);
  if (!match) {
    throw new RangeError(`Invalid business date: "${day}"`);
  }
  const [, y, m, d] = match;
  const utc = Date.UTC(Number(y), Number(m) - 1, Number(d));
  // 2026-02-30 sẽ bị Date.UTC đẩy sang tháng 3
  if (new Date(utc).toISOString().slice(0, 10) !== day) {
    throw new RangeError(`Invalid business date: "${day}"`);
  }
  return utc;
};

export const isBusinessDate = (value: string): boolean => {
  try {
    parseBusinessDate(value);
    return true;
  } catch {
    return false;
  }
};

export const toBusinessDate = (instant: Date, utcOffsetMinutes: number): BusinessDate =>
  new Date(instant.getTime() + utcOffsetMinutes * MS_PER_MINUTE).toISOString().slice(0, 10);

export const businessDayRange = (day: BusinessDate, utcOffsetMinutes: number): DateRange => {
  const start = parseBusinessDate(day) - utcOffsetMinutes * MS_PER_MINUTE;
  return { start: new Date(start), end: new Date(start + MS_PER_DAY) };
};

export const addDays = (day: BusinessDate, days: number): BusinessDate =>
  new Date(parseBusinessDate(day) + days * MS_PER_DAY).toISOString().slice(0, 10);

export const previousBusinessDate = (now: Date, utcOffsetMinutes: number): BusinessDate =>
  addDays(toBusinessDate(now, utcOffsetMinutes), -1);

/**
 * Monday..Sunday of the week before the one containing `now`.
 */
export const previousWeekRange = (now: Date, utcOffsetMinutes: number): BusinessPeriod => {
  const today = toBusinessDate(now, utcOffsetMinutes);
  const weekday = new Date(parseBusinessDate(today)).getUTCDay(); // 0 = Chủ nhật
  const thisMonday = addDays(today, -((weekday + 6) % 7));
  return { start: addDays(thisMonday, -7), end: addDays(thisMonday, -1) };
};

export const eachBusinessDate = (period: BusinessPeriod): BusinessDate[] => {
  const days: BusinessDate[] = [];
  for (let day = period.start; day <= period.end; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
};
