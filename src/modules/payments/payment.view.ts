import { Payment } from './entities/payment.entity';
import { PayerType } from './payer-type.enum';
import { basisPointsToPercent, fromHalalas } from '../../common/utils/money.util';

export interface PaymentView {
    id: string;
    contractId: string;
    contractNumber: string | null;
    unitId: string;
    unitNumber: string | null;
    projectName: string | null;
    payerType: PayerType;
    payerId: string | null;
    amount: number;
    paidOn: string;
    description: string | null;
    companyRate: number;
    vatRate: number;
    companyCommission: number | null;
    vatOnCommission: number | null;
    netToOwner: number | null;
    recordedBy: string;
    createdAt: Date;
}

// Money in SAR, rates in percent
export function toPaymentView(payment: Payment): PaymentView {
    const commission = payment.commission;
    return {
        id: payment.id,
        contractId: payment.contractId,
        contractNumber: payment.contract?.contractNumber ?? null,
        unitId: payment.unitId,
        unitNumber: payment.unit?.unitNumber ?? null,
        projectName: payment.unit?.project?.name ?? null,
        payerType: payment.payerType,
        payerId: payment.payerId,
        amount: fromHalalas(payment.amount),
        paidOn: payment.paidOn,
        description: payment.description,
        companyRate: basisPointsToPercent(payment.companyRateBp),
        vatRate: basisPointsToPercent(payment.vatRateBp),
        companyCommission: commission ? fromHalalas(commission.companyCommission) : null,
        vatOnCommission: commission ? fromHalalas(commission.vatOnCommission) : null,
        netToOwner: commission ? fromHalalas(commission.netToOwner) : null,
        recordedBy: payment.recordedBy,
        createdAt: payment.createdAt,
    };
}
