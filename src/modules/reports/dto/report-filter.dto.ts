import { IsEnum, IsOptional, IsUUID, Matches } from 'class-validator';
import { PayerType } from '../../payments/payer-type.enum';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export class ReportFilterDto {
    @IsOptional()
    @Matches(DATE_ONLY, { message: 'from must be YYYY-MM-DD' })
    from?: string;

    @IsOptional()
    @Matches(DATE_ONLY, { message: 'to must be YYYY-MM-DD' })
    to?: string;

    @IsOptional()
    @IsUUID()
    projectId?: string;

    @IsOptional()
    @IsUUID()
    ownerId?: string;

    @IsOptional()
    @IsEnum(PayerType)
    payerType?: PayerType;
}
