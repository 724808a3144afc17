import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { IsOptional, IsString } from 'class-validator';
import { ActivityService } from './activity.service';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { RolesGuard } from '../../common/guards/roles.guard';
import { Roles } from '../../common/decorators/roles.decorator';
import { Role } from '../users/role.enum';
import { PaginationQueryDto } from '../../common/utils/pagination';

class ActivityQueryDto extends PaginationQueryDto {
    @IsOptional()
    @IsString()
    entityType?: string;
}

@Controller('activity')
@UseGuards(JwtAuthGuard, RolesGuard)
export class ActivityController {
    constructor(private readonly activityService: ActivityService) { }

    @Roles(Role.ADMIN)
    @Get()
    findAll(@Query() query: ActivityQueryDto) {
        return this.activityService.findAll(query);
    }
}
