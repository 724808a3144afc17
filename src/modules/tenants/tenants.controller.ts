import { Body, Controller, Delete, Get, Param, ParseUUIDPipe, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { TenantsService } from './tenants.service';
import { CreateTenantDto } from './dto/create-tenant.dto';
import { UpdateTenantDto } from './dto/update-tenant.dto';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { CsrfGuard } from '../../common/guards/csrf.guard';
import { RolesGuard } from '../../common/guards/roles.guard';
import { Roles } from '../../common/decorators/roles.decorator';
import { GetUser } from '../../common/decorators/get-user.decorator';
import { RealIp } from '../../common/decorators/real-ip.decorator';
import { PaginationQueryDto } from '../../common/utils/pagination';
import { Role } from '../users/role.enum';
import { AuthUser } from '../auth/auth-user';
import { actorFrom } from '../activity/actor';

@Controller('tenants')
@UseGuards(JwtAuthGuard, CsrfGuard, RolesGuard)
export class TenantsController {
    constructor(private readonly tenantsService: TenantsService) { }

    @Roles(Role.CLERK)
    @Post()
    create(@Body() createTenantDto: CreateTenantDto, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.tenantsService.create(createTenantDto, actorFrom(user, ip));
    }

    @Get()
    findAll(@Query() query: PaginationQueryDto) {
        return this.tenantsService.findAll(query);
    }

    @Get(':id')
    findOne(@Param('id', ParseUUIDPipe) id: string) {
        return this.tenantsService.findOne(id);
    }

    @Roles(Role.CLERK)
    @Patch(':id')
    update(
        @Param('id', ParseUUIDPipe) id: string,
        @Body() updateTenantDto: UpdateTenantDto,
        @GetUser() user?: AuthUser,
        @RealIp() ip?: string,
    ) {
        return this.tenantsService.update(id, updateTenantDto, actorFrom(user, ip));
    }

    @Roles(Role.ADMIN)
    @Delete(':id')
    remove(@Param('id', ParseUUIDPipe) id: string, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.tenantsService.remove(id, actorFrom(user, ip));
    }
}
