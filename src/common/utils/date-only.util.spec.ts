import { addDays, addMonths, monthsBetween, parseDateOnly, quarterOf, todayDateOnly } from './date-only.util';

describe('date-only.util', () => {
    it('parses real calendar dates only', () => {
        expect(parseDateOnly('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
        expect(parseDateOnly('2023-02-29')).toBeNull();
        expect(parseDateOnly('2024-13-01')).toBeNull();
        expect(parseDateOnly('2024/01/01')).toBeNull();
    });

    it('adds months clamping to the end of shorter months', () => {
        expect(addMonths('2024-01-31', 1)).toBe('2024-02-29');
        expect(addMonths('2024-11-15', 3)).toBe('2025-02-15');
        expect(addMonths('2024-03-31', -1)).toBe('2024-02-29');
    });

    it('adds days across month ends', () => {
        expect(addDays('2024-02-28', 2)).toBe('2024-03-01');
    });

    it('counts a partial trailing month as a month', () => {
        expect(monthsBetween('2024-01-01', '2024-12-31')).toBe(12);
        expect(monthsBetween('2024-01-15', '2024-03-15')).toBe(2);
    });

    it('names the quarter of a date', () => {
        expect(quarterOf('2024-05-10')).toBe('2024-Q2');
        expect(quarterOf('2024-12-31')).toBe('2024-Q4');
    });

    it('takes today in Riyadh time', () => {
        // 22:30 UTC is already the next day in Riyadh (UTC+3)
        expect(todayDateOnly(new Date('2024-03-10T22:30:00Z'))).toBe('2024-03-11');
        expect(todayDateOnly(new Date('2024-03-10T20:59:00Z'))).toBe('2024-03-10');
    });
});
