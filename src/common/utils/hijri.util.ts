import { DateParts, dateOnlyToUtc, formatDateOnly, utcToDateOnly } from './date-only.util';

export type HijriDate = DateParts;

const HIJRI_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;
// Julian day of 1 Muharram 1 AH (civil epoch) and of 1970-01-01
const ISLAMIC_EPOCH_JD = 1948439.5;
const UNIX_EPOCH_JD = 2440587.5;

const umalquraFormatter = new Intl.DateTimeFormat('en-US-u-ca-islamic-umalqura-nu-latn', {
    timeZone: 'UTC',
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
});

function hijriFromUtc(date: Date): HijriDate {
    const parts = umalquraFormatter.formatToParts(date);
    const read = (type: Intl.DateTimeFormatPartTypes) => parseInt(parts.find(p => p.type === type)?.value ?? '0', 10);
    return { year: read('year'), month: read('month'), day: read('day') };
}

function sameDate(a: HijriDate, b: HijriDate) {
    return a.year === b.year && a.month === b.month && a.day === b.day;
}

// Tabular (arithmetic) calendar; within a couple of days of Umm al-Qura
function tabularHijriToUtc(h: HijriDate): Date {
    const jd = h.day
        + Math.ceil(29.5 * (h.month - 1))
        + (h.year - 1) * 354
        + Math.floor((3 + 11 * h.year) / 30)
        + ISLAMIC_EPOCH_JD - 1;
    return new Date(Math.round((jd - UNIX_EPOCH_JD) * DAY_MS));
}

export function toHijri(gregorian: string): HijriDate {
    return hijriFromUtc(dateOnlyToUtc(gregorian));
}

/**
 * Gregorian date (YYYY-MM-DD) of a Umm al-Qura date, or null when the date does not exist
 * (e.g. day 30 of a 29-day month).
 */
export function fromHijri(hijri: HijriDate): string | null {
    if (hijri.month < 1 || hijri.month > 12 || hijri.day < 1 || hijri.day > 30) return null;

    const estimate = tabularHijriToUtc(hijri);
    for (const offset of [0, -1, 1, -2, 2, -3, 3]) {
        const candidate = new Date(estimate.getTime() + offset * DAY_MS);
        if (sameDate(hijriFromUtc(candidate), hijri)) {
            return utcToDateOnly(candidate);
        }
    }
    return null;
}

export function parseHijri(value: string): HijriDate | null {
    const m = HIJRI_PATTERN.exec(value.trim());
    if (!m) return null;
    const parsed = { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) };
    if (parsed.month < 1 || parsed.month > 12 || parsed.day < 1 || parsed.day > 30) return null;
    return parsed;
}

export function formatHijri(hijri: HijriDate): string {
    return formatDateOnly(hijri);
}

export function hijriString(gregorian: string | null | undefined): string | null {
    if (!gregorian) return null;
    return formatHijri(toHijri(gregorian));
}
