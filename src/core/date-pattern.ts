/**
 * strftime-style date rendering for log line stamps.
 *
 * Supported tokens: %a %A %b %B %d %e %H %I %M %S %p %y %Y %m %j %z %s %F %T
 * %n %t %%. Unknown tokens are copied through unchanged.
 * @module
 */

export interface DatePatternOptions {
  /** Render in UTC instead of the process's local time zone. */
  utc?: boolean;
}

interface DateFields {
  year: number;
  month: number; // 0-11
  day: number;
  weekday: number; // 0 = Sunday
  hours: number;
  minutes: number;
  seconds: number;
  offsetMinutes: number; // east of UTC
  epochMs: number;
}

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

const pad = (n: number, width = 2, fill = "0") => String(n).padStart(width, fill);

function dayOfYear(f: DateFields): number {
  return (Date.UTC(f.year, f.month, f.day) - Date.UTC(f.year, 0, 0)) / 86_400_000;
}

function offset(f: DateFields): string {
  const sign = f.offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(f.offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
}

const TOKENS = new Map<string, (f: DateFields) => string>([
  ["a", (f) => WEEKDAYS[f.weekday].slice(0, 3)],
  ["A", (f) => WEEKDAYS[f.weekday]],
  ["b", (f) => MONTHS[f.month].slice(0, 3)],
  ["B", (f) => MONTHS[f.month]],
  ["d", (f) => pad(f.day)],
  ["e", (f) => pad(f.day, 2, " ")],
  ["H", (f) => pad(f.hours)],
  ["I", (f) => pad(f.hours % 12 || 12)],
  ["M", (f) => pad(f.minutes)],
  ["S", (f) => pad(f.seconds)],
  ["p", (f) => (f.hours < 12 ? "AM" : "PM")],
  ["y", (f) => pad(f.year % 100)],
  ["Y", (f) => String(f.year)],
  ["m", (f) => pad(f.month + 1)],
  ["j", (f) => pad(dayOfYear(f), 3)],
  ["z", offset],
  ["s", (f) => String(Math.floor(f.epochMs / 1000))],
  ["F", (f) => `${f.year}-${pad(f.month + 1)}-${pad(f.day)}`],
  ["T", (f) => `${pad(f.hours)}:${pad(f.minutes)}:${pad(f.seconds)}`],
  ["n", () => "\n"],
  ["t", () => "\t"],
  ["%", () => "%"],
]);

function fieldsOf(date: Date, utc: boolean): DateFields {
  if (utc) {
    return {
      year: date.getUTCFullYear(),
      month: date.getUTCMonth(),
      day: date.getUTCDate(),
      weekday: date.getUTCDay(),
      hours: date.getUTCHours(),
      minutes: date.getUTCMinutes(),
      seconds: date.getUTCSeconds(),
      offsetMinutes: 0,
      epochMs: date.getTime(),
    };
  }
  return {
    year: date.getFullYear(),
    month: date.getMonth(),
    day: date.getDate(),
    weekday: date.getDay(),
    hours: date.getHours(),
    minutes: date.getMinutes(),
    seconds: date.getSeconds(),
    offsetMinutes: -date.getTimezoneOffset(),
    epochMs: date.getTime(),
  };
}

export function renderDate(pattern: string, date: Date, options: DatePatternOptions = {}): string {
  if (Number.isNaN(date.getTime())) return "Invalid Date";
  const fields = fieldsOf(date, options.utc ?? false);
  return pattern.replace(/%(.)/gs, (token, key: string) => {
    const render = TOKENS.get(key);
    return render ? render(fields) : token;
  });
}
