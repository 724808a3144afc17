import { FREQUENCY_MONTHS, PaymentFrequency } from '../contracts/contract.enums';
import { addMonths } from '../../common/utils/date-only.util';
import { hijriString } from '../../common/utils/hijri.util';

export type InstallmentStatus = 'paid' | 'due' | 'overdue';

export interface ScheduleTerms {
    startDate: string;
    endDate: string;
    totalAmount: number;
    paymentFrequency: PaymentFrequency;
}

export interface Installment {
    number: number;
    dueDate: string;
    dueDateHijri: string | null;
    amount: number;
    paid: number;
    outstanding: number;
    status: InstallmentStatus;
}

/**
 * Due dates run from the start date in steps of the payment frequency while they fall
 * before the end date. Offsets are taken from the start date so a 31st keeps its day
 * where the month allows.
 */
export function dueDates(terms: Pick<ScheduleTerms, 'startDate' | 'endDate' | 'paymentFrequency'>): string[] {
    const step = FREQUENCY_MONTHS[terms.paymentFrequency];
    const dates: string[] = [];
    for (let k = 0; ; k++) {
        const due = addMonths(terms.startDate, k * step);
        if (k > 0 && due >= terms.endDate) break;
        dates.push(due);
    }
    return dates;
}

/**
 * Installments for a contract with `paidTotal` halalas allocated oldest first.
 */
export function buildSchedule(terms: ScheduleTerms, paidTotal: number, asOf: string): Installment[] {
    const dates = dueDates(terms);
    const count = dates.length;
    const base = Math.floor(terms.totalAmount / count);
    const remainder = terms.totalAmount - base * count;

    let unallocated = paidTotal;
    return dates.map((dueDate, index) => {
        const amount = index === count - 1 ? base + remainder : base;
        const paid = Math.min(amount, Math.max(0, unallocated));
        unallocated -= paid;

        let status: InstallmentStatus = 'due';
        if (paid >= amount) status = 'paid';
        else if (dueDate < asOf) status = 'overdue';

        return {
            number: index + 1,
            dueDate,
            dueDateHijri: hijriString(dueDate),
            amount,
            paid,
            outstanding: amount - paid,
            status,
        };
    });
}
