/**
 * Upcoming birthdays window
 * =========================
 * Month-day keys (`MM-DD`) for today .. today + days, in calendar order,
 * wrapping over the new year. Dates are taken in UTC.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function monthDayKey(date: Date): string {
  return `${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function upcomingMonthDays(today: Date, days: number): string[] {
  const start = Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate());
  const keys: string[] = [];

  for (let i = 0; i <= days; i++) {
    const date = new Date(start + i * DAY_MS);
    const key = monthDayKey(date);
    if (keys.includes(key)) {break;}
    keys.push(key);

    // Feb 29 birthdays are celebrated on Feb 28 in common years.
    if (key === "02-28" && !isLeapYear(date.getUTCFullYear()) && !keys.includes("02-29")) {
      keys.push("02-29");
    }
  }

  return keys;
}
