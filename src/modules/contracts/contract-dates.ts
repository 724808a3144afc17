import { BadRequestException } from '@nestjs/common';
import { isDateOnly } from '../../common/utils/date-only.util';
import { fromHijri, parseHijri } from '../../common/utils/hijri.util';

export interface DateInput {
    startDate?: string;
    endDate?: string;
    startDateHijri?: string;
    endDateHijri?: string;
}

function resolveOne(gregorian: string | undefined, hijri: string | undefined, field: string): string | undefined {
    if (gregorian !== undefined) {
        if (!isDateOnly(gregorian)) {
            throw new BadRequestException(`${field} is not a valid date`);
        }
        return gregorian;
    }
    if (hijri !== undefined) {
        const parsed = parseHijri(hijri);
        const converted = parsed ? fromHijri(parsed) : null;
        if (!converted) {
            throw new BadRequestException(`${field}Hijri is not a valid Hijri date`);
        }
        return converted;
    }
    return undefined;
}

/**
 * Gregorian start/end from either calendar. Missing values fall back to `current` (used on update).
 */
export function resolveContractDates(input: DateInput, current?: { startDate: string; endDate: string }) {
    const startDate = resolveOne(input.startDate, input.startDateHijri, 'startDate') ?? current?.startDate;
    const endDate = resolveOne(input.endDate, input.endDateHijri, 'endDate') ?? current?.endDate;

    if (!startDate || !endDate) {
        throw new BadRequestException('Contract start and end dates are required (Gregorian or Hijri)');
    }
    // YYYY-MM-DD compares lexically
    if (endDate <= startDate) {
        throw new BadRequestException('Contract end date must be after the start date');
    }
    return { startDate, endDate };
}
