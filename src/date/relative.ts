/** Local midnight of the current day. */
export function today(now: Date = new Date()): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate());
}

export function tomorrow(now: Date = new Date()): Date {
  const t = today(now);
  return new Date(t.getFullYear(), t.getMonth(), t.getDate() + 1);
}

export function daysAgo(n: number, now: Date = new Date()): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() - n,
    now.getHours(), now.getMinutes(), now.getSeconds(), now.getMilliseconds());
}

export function weeksAgo(n: number, now: Date = new Date()): Date {
  return daysAgo(n * 7, now);
}

export function monthsAgo(n: number, now: Date = new Date()): Date {
  return new Date(now.getFullYear(), now.getMonth() - n, now.getDate(),
    now.getHours(), now.getMinutes(), now.getSeconds(), now.getMilliseconds());
}

export function yearsAgo(n: number, now: Date = new Date()): Date {
  return new Date(now.getFullYear() - n, now.getMonth(), now.getDate(),
    now.getHours(), now.getMinutes(), now.getSeconds(), now.getMilliseconds());
}

export type DurationUnit = 'days' | 'weeks' | 'months' | 'years';

export interface Duration {
  readonly amount: number;
  readonly unit: DurationUnit;
}

export const days = (amount: number): Duration => ({ amount, unit: 'days' });
export const weeks = (amount: number): Duration => ({ amount, unit: 'weeks' });
export const months = (amount: number): Duration => ({ amount, unit: 'months' });
export const years = (amount: number): Duration => ({ amount, unit: 'years' });

/** The instant `duration` before `now`. */
export function durationAgo(duration: Duration, now: Date = new Date()): Date {
  switch (duration.unit) {
    case 'days':
      return daysAgo(duration.amount, now);
    case 'weeks':
      return weeksAgo(duration.amount, now);
    case 'months':
      return monthsAgo(duration.amount, now);
    case 'years':
      return yearsAgo(duration.amount, now);
  }
}
