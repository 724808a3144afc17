import { Transform } from 'class-transformer';
import {
    IsEnum, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, IsUUID, Matches, Max, MaxLength,
} from 'class-validator';
import { PaymentFrequency } from '../contract.enums';

export const MAX_AMOUNT_SAR = 100_000_000;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HIJRI_DATE = /^\d{4}-\d{1,2}-\d{1,2}$/;

const toNumber = ({ value }: { value: unknown }) =>
    (typeof value === 'string' && value.trim() !== '' ? Number(value) : value);

/**
 * Dates may be given Gregorian (startDate/endDate) or Hijri (startDateHijri/endDateHijri);
 * a Gregorian value wins when both are present.
 */
export class CreateContractDto {
    @IsUUID()
    unitId!: string;

    @IsUUID()
    tenantId!: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    @MaxLength(100)
    contractNumber?: string;

    @IsOptional()
    @Matches(DATE_ONLY, { message: 'startDate must be YYYY-MM-DD' })
    startDate?: string;

    @IsOptional()
    @Matches(DATE_ONLY, { message: 'endDate must be YYYY-MM-DD' })
    endDate?: string;

    @IsOptional()
    @Matches(HIJRI_DATE, { message: 'startDateHijri must be YYYY-MM-DD (Hijri)' })
    startDateHijri?: string;

    @IsOptional()
    @Matches(HIJRI_DATE, { message: 'endDateHijri must be YYYY-MM-DD (Hijri)' })
    endDateHijri?: string;

    // SAR
    @Transform(toNumber)
    @IsNumber({ maxDecimalPlaces: 2 })
    @IsPositive()
    @Max(MAX_AMOUNT_SAR)
    totalAmount!: number;

    @IsOptional()
    @IsEnum(PaymentFrequency)
    paymentFrequency?: PaymentFrequency;

    @IsOptional()
    @IsString()
    notes?: string;
}
