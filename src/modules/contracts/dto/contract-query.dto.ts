import { IsEnum, IsOptional, IsUUID } from 'class-validator';
import { PaginationQueryDto } from '../../../common/utils/pagination';
import { ContractStatus } from '../contract.enums';

export class ContractQueryDto extends PaginationQueryDto {
    @IsOptional()
    @IsEnum(ContractStatus)
    status?: ContractStatus;

    @IsOptional()
    @IsUUID()
    unitId?: string;

    @IsOptional()
    @IsUUID()
    tenantId?: string;
}
