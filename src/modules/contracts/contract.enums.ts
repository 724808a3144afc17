export enum ContractStatus {
    ACTIVE = 'active',
    ENDED = 'ended',
    TERMINATED = 'terminated',
}

export enum PaymentFrequency {
    MONTHLY = 'monthly',
    QUARTERLY = 'quarterly',
    SEMIANNUAL = 'semiannual',
    ANNUAL = 'annual',
}

export const FREQUENCY_MONTHS: Record<PaymentFrequency, number> = {
    [PaymentFrequency.MONTHLY]: 1,
    [PaymentFrequency.QUARTERLY]: 3,
    [PaymentFrequency.SEMIANNUAL]: 6,
    [PaymentFrequency.ANNUAL]: 12,
};
