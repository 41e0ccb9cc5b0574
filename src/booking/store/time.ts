import { ConstraintViolationError } from "./errors";

const MINUTES_PER_DAY = 24 * 60;

export function toMinutes(time: string): number {
  const [hours, minutes] = time.split(":").map(Number);
  return hours * 60 + minutes;
}

export function fromMinutes(total: number): string {
  const hours = Math.floor(total / 60);
  const minutes = total % 60;
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}

/** Add minutes to an HH:MM time. Appointments never run past midnight. */
export function addMinutes(time: string, minutes: number): string {
  const total = toMinutes(time) + minutes;
  if (total >= MINUTES_PER_DAY) {
    throw new ConstraintViolationError(
      `An appointment starting at ${time} and lasting ${minutes} minutes would end after midnight`
    );
  }
  return fromMinutes(total);
}

export function minutesBetween(start: string, end: string): number {
  return toMinutes(end) - toMinutes(start);
}

/** Local calendar date as YYYY-MM-DD. */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function today(now: Date = new Date()): string {
  return formatDate(now);
}

export function addDays(isoDate: string, days: number): string {
  const [year, month, day] = isoDate.split("-").map(Number);
  // setUTCFullYear keeps years below 100 as written
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day + days);
  return date.toISOString().slice(0, 10);
}
