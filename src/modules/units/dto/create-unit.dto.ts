import { Transform } from 'class-transformer';
import { IsEnum, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, IsUUID, MaxLength } from 'class-validator';
import { UnitStatus } from '../unit-status.enum';

export class CreateUnitDto {
    @IsUUID()
    projectId!: string;

    @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
    @IsString()
    @IsNotEmpty()
    @MaxLength(50)
    unitNumber!: string;

    @IsOptional()
    @IsString()
    @MaxLength(50)
    type?: string;

    @IsOptional()
    @Transform(({ value }) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value))
    @IsNumber()
    @IsPositive()
    area?: number;

    @IsOptional()
    @IsUUID()
    ownerId?: string | null;

    @IsOptional()
    @IsEnum(UnitStatus)
    status?: UnitStatus;
}
