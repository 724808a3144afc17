const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

export const RIYADH_TIME_ZONE = 'Asia/Riyadh';

export interface DateParts {
    year: number;
    month: number;
    day: number;
}

function pad2(n: number) {
    return String(n).padStart(2, '0');
}

export function parseDateOnly(value: string): DateParts | null {
    const m = DATE_ONLY.exec(value.trim());
    if (!m) return null;
    const parts = { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) };
    // Reject 2024-02-30 and friends
    const probe = new Date(Date.UTC(parts.year, parts.month - 1, parts.day));
    if (probe.getUTCFullYear() !== parts.year || probe.getUTCMonth() !== parts.month - 1 || probe.getUTCDate() !== parts.day) {
        return null;
    }
    return parts;
}

export function isDateOnly(value: string): boolean {
    return parseDateOnly(value) !== null;
}

export function formatDateOnly(parts: DateParts): string {
    return `${parts.year}-${pad2(parts.month)}-${pad2(parts.day)}`;
}

export function dateOnlyToUtc(value: string): Date {
    const parts = parseDateOnly(value);
    if (!parts) throw new RangeError(`Invalid date (YYYY-MM-DD): ${value}`);
    return new Date(Date.UTC(parts.year, parts.month - 1, parts.day));
}

export function utcToDateOnly(date: Date): string {
    return formatDateOnly({
        year: date.getUTCFullYear(),
        month: date.getUTCMonth() + 1,
        day: date.getUTCDate(),
    });
}

/**
 * Calendar date of `now` in the given time zone.
 */
export function todayDateOnly(now: Date = new Date(), timeZone: string = RIYADH_TIME_ZONE): string {
    const formatter = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: 'numeric',
        day: 'numeric',
    });
    const parts = formatter.formatToParts(now);
    const read = (type: Intl.DateTimeFormatPartTypes) => parseInt(parts.find(p => p.type === type)?.value ?? '0', 10);
    return formatDateOnly({ year: read('year'), month: read('month'), day: read('day') });
}

/**
 * Adds calendar months, clamping the day to the end of shorter months (Jan 31 + 1 month = Feb 29 in 2024).
 */
export function addMonths(value: string, months: number): string {
    const parts = parseDateOnly(value);
    if (!parts) throw new RangeError(`Invalid date (YYYY-MM-DD): ${value}`);
    const index = parts.year * 12 + (parts.month - 1) + months;
    const year = Math.floor(index / 12);
    const month = (index % 12) + 1;
    const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
    return formatDateOnly({ year, month, day: Math.min(parts.day, lastDay) });
}

export function addDays(value: string, days: number): string {
    const date = dateOnlyToUtc(value);
    date.setUTCDate(date.getUTCDate() + days);
    return utcToDateOnly(date);
}

/**
 * Whole months from `start` to `end`, counting a partial trailing month as one.
 */
export function monthsBetween(start: string, end: string): number {
    const a = parseDateOnly(start);
    const b = parseDateOnly(end);
    if (!a || !b) throw new RangeError(`Invalid date range: ${start} - ${end}`);
    let months = (b.year - a.year) * 12 + (b.month - a.month);
    if (b.day > a.day) months += 1;
    return Math.max(0, months);
}

export function quarterOf(value: string): string {
    const parts = parseDateOnly(value);
    if (!parts) throw new RangeError(`Invalid date (YYYY-MM-DD): ${value}`);
    return `${parts.year}-Q${Math.floor((parts.month - 1) / 3) + 1}`;
}
