import { Contract } from './entities/contract.entity';
import { ContractStatus, PaymentFrequency } from './contract.enums';
import { hijriString } from '../../common/utils/hijri.util';
import { fromHalalas } from '../../common/utils/money.util';

export interface ContractView {
    id: string;
    contractNumber: string | null;
    unitId: string;
    unitNumber: string | null;
    projectName: string | null;
    tenantId: string;
    tenantName: string | null;
    startDate: string;
    endDate: string;
    startDateHijri: string | null;
    endDateHijri: string | null;
    totalAmount: number;
    paymentFrequency: PaymentFrequency;
    status: ContractStatus;
    notes: string | null;
    document: { name: string; mimeType: string | null; size: number | null } | null;
    createdAt: Date;
    updatedAt: Date;
}

export function toContractView(contract: Contract): ContractView {
    return {
        id: contract.id,
        contractNumber: contract.contractNumber,
        unitId: contract.unitId,
        unitNumber: contract.unit?.unitNumber ?? null,
        projectName: contract.unit?.project?.name ?? null,
        tenantId: contract.tenantId,
        tenantName: contract.tenant?.name ?? null,
        startDate: contract.startDate,
        endDate: contract.endDate,
        startDateHijri: hijriString(contract.startDate),
        endDateHijri: hijriString(contract.endDate),
        totalAmount: fromHalalas(contract.totalAmount),
        paymentFrequency: contract.paymentFrequency,
        status: contract.status,
        notes: contract.notes,
        document: contract.documentKey && contract.documentName
            ? { name: contract.documentName, mimeType: contract.documentMimeType, size: contract.documentSize }
            : null,
        createdAt: contract.createdAt,
        updatedAt: contract.updatedAt,
    };
}
