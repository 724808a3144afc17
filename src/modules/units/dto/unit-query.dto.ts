import { IsEnum, IsOptional, IsUUID } from 'class-validator';
import { PaginationQueryDto } from '../../../common/utils/pagination';
import { UnitStatus } from '../unit-status.enum';

export class UnitQueryDto extends PaginationQueryDto {
    @IsOptional()
    @IsEnum(UnitStatus)
    status?: UnitStatus;

    @IsOptional()
    @IsUUID()
    projectId?: string;

    @IsOptional()
    @IsUUID()
    ownerId?: string;
}
