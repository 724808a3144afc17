import { IsOptional, Matches } from 'class-validator';

export class ScheduleQueryDto {
    @IsOptional()
    @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'asOf must be YYYY-MM-DD' })
    asOf?: string;
}
