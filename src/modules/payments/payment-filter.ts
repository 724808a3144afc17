import { SelectQueryBuilder } from 'typeorm';
import { Payment } from './entities/payment.entity';
import { PayerType } from './payer-type.enum';
import { likePattern } from '../../common/utils/pagination';
import { toHalalas } from '../../common/utils/money.util';

export interface PaymentFilter {
    from?: string;
    to?: string;
    projectId?: string;
    ownerId?: string;
    unitId?: string;
    contractId?: string;
    payerType?: PayerType;
    search?: string;
}

/**
 * Restricts a query on `payment` (joined to `unit` as `unit`) to the filter. Both date bounds are inclusive.
 */
export function applyPaymentFilter(qb: SelectQueryBuilder<Payment>, filter: PaymentFilter): SelectQueryBuilder<Payment> {
    if (filter.from) {
        qb.andWhere('payment.paidOn >= :from', { from: filter.from });
    }
    if (filter.to) {
        qb.andWhere('payment.paidOn <= :to', { to: filter.to });
    }
    if (filter.projectId) {
        qb.andWhere('unit.projectId = :projectId', { projectId: filter.projectId });
    }
    if (filter.ownerId) {
        qb.andWhere('unit.ownerId = :ownerId', { ownerId: filter.ownerId });
    }
    if (filter.unitId) {
        qb.andWhere('payment.unitId = :unitId', { unitId: filter.unitId });
    }
    if (filter.contractId) {
        qb.andWhere('payment.contractId = :contractId', { contractId: filter.contractId });
    }
    if (filter.payerType) {
        qb.andWhere('payment.payerType = :payerType', { payerType: filter.payerType });
    }
    if (filter.search) {
        const amount = searchedAmount(filter.search);
        if (amount === null) {
            qb.andWhere("LOWER(payment.description) LIKE :search ESCAPE '\\'", { search: likePattern(filter.search) });
        } else {
            qb.andWhere(
                "(LOWER(payment.description) LIKE :search ESCAPE '\\' OR payment.amount = :searchAmount)",
                { search: likePattern(filter.search), searchAmount: amount },
            );
        }
    }
    return qb;
}

// "1,500.50" searches for 150050 halalas
function searchedAmount(search: string): number | null {
    const normalized = search.trim().replace(/,/g, '');
    if (!/^\d+(\.\d{1,2})?$/.test(normalized)) return null;
    return toHalalas(Number(normalized));
}
