import { Transform } from 'class-transformer';
import { IsEnum, IsNumber, IsOptional, IsPositive, IsString, IsUUID, Matches, Max, MaxLength, Min } from 'class-validator';
import { PayerType } from '../payer-type.enum';
import { MAX_AMOUNT_SAR } from '../../contracts/dto/create-contract.dto';

const toNumber = ({ value }: { value: unknown }) =>
    (typeof value === 'string' && value.trim() !== '' ? Number(value) : value);

export class CreatePaymentDto {
    @IsUUID()
    contractId!: string;

    // SAR
    @Transform(toNumber)
    @IsNumber({ maxDecimalPlaces: 2 }, { message: 'amount must be a number with at most 2 decimal places' })
    @IsPositive()
    @Max(MAX_AMOUNT_SAR)
    amount!: number;

    @IsOptional()
    @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'paidOn must be YYYY-MM-DD' })
    paidOn?: string;

    @IsOptional()
    @IsEnum(PayerType)
    payerType?: PayerType;

    @IsOptional()
    @IsUUID()
    payerId?: string;

    @IsOptional()
    @IsString()
    @MaxLength(255)
    description?: string;

    // Percent; configured default when omitted
    @IsOptional()
    @Transform(toNumber)
    @IsNumber({ maxDecimalPlaces: 2 })
    @Min(0)
    @Max(100)
    companyRate?: number;

    @IsOptional()
    @Transform(toNumber)
    @IsNumber({ maxDecimalPlaces: 2 })
    @Min(0)
    @Max(100)
    vatRate?: number;
}
