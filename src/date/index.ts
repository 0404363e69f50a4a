const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'] as const;

const SHORT_WEEKDAYS = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'] as const;
const LONG_WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const;

// Sun, 06 Nov 1994 08:49:37 GMT
const IMF_FIXDATE = /^([a-z]{3}), (\d{2}) ([a-z]{3}) (\d{4}) (\d{2}):(\d{2}):(\d{2}) gmt$/i;
// Sunday, 06-Nov-94 08:49:37 GMT
const RFC_850 = /^([a-z]{6,9}), (\d{2})-([a-z]{3})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) gmt$/i;
// Sun Nov  6 08:49:37 1994
const ASCTIME = /^([a-z]{3}) ([a-z]{3}) {1,2}(\d{1,2}) (\d{2}):(\d{2}):(\d{2}) (\d{4})$/i;

interface DateParts {
  weekday: string;
  year: number;
  month: string;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function matchDateParts(value: string): DateParts | null {
  let match = IMF_FIXDATE.exec(value);
  if (match) {
    const [, weekday = '', day = '', month = '', year = '', hour = '', minute = '', second = ''] = match;
    return {
      weekday, month, year: Number(year), day: Number(day), hour: Number(hour), minute: Number(minute), second: Number(second),
    };
  }

  match = RFC_850.exec(value);
  if (match) {
    const [, weekday = '', day = '', month = '', shortYear = '', hour = '', minute = '', second = ''] = match;
    const year = Number(shortYear);
    return {
      weekday,
      month,
      year: year + (year >= 70 ? 1900 : 2000),
      day: Number(day),
      hour: Number(hour),
      minute: Number(minute),
      second: Number(second),
    };
  }

  match = ASCTIME.exec(value);
  if (match) {
    const [, weekday = '', month = '', day = '', hour = '', minute = '', second = '', year = ''] = match;
    return {
      weekday, month, year: Number(year), day: Number(day), hour: Number(hour), minute: Number(minute), second: Number(second),
    };
  }

  return null;
}

export function isWeekdayName(name: string): boolean {
  const lower = name.toLowerCase();
  return SHORT_WEEKDAYS.some((day) => day === lower) || LONG_WEEKDAYS.some((day) => day === lower);
}

export function formatHttpDate(date: Date): string {
  // toUTCString emits the IMF-fixdate layout
  return date.toUTCString();
}

export function parseHttpDate(value: string): Date | null {
  const parts = matchDateParts(value.trim());
  if (!parts || !isWeekdayName(parts.weekday)) {
    return null;
  }

  const month = MONTHS.findIndex((name) => name === parts.month.toLowerCase());
  if (month === -1) {
    return null;
  }

  const date = new Date(Date.UTC(parts.year, month, parts.day, parts.hour, parts.minute, parts.second));
  if (
    date.getUTCFullYear() !== parts.year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== parts.day ||
    date.getUTCHours() !== parts.hour ||
    date.getUTCMinutes() !== parts.minute ||
    date.getUTCSeconds() !== parts.second
  ) {
    return null;
  }
  return date;
}
