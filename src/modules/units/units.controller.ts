import { Body, Controller, Delete, Get, Param, ParseUUIDPipe, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { UnitsService } from './units.service';
import { CreateUnitDto } from './dto/create-unit.dto';
import { UpdateUnitDto } from './dto/update-unit.dto';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { CsrfGuard } from '../../common/guards/csrf.guard';
import { RolesGuard } from '../../common/guards/roles.guard';
import { Roles } from '../../common/decorators/roles.decorator';
import { GetUser } from '../../common/decorators/get-user.decorator';
import { RealIp } from '../../common/decorators/real-ip.decorator';
import { UnitQueryDto } from './dto/unit-query.dto';
import { Role } from '../users/role.enum';
import { AuthUser } from '../auth/auth-user';
import { actorFrom } from '../activity/actor';

@Controller('units')
@UseGuards(JwtAuthGuard, CsrfGuard, RolesGuard)
export class UnitsController {
    constructor(private readonly unitsService: UnitsService) { }

    @Roles(Role.CLERK)
    @Post()
    create(@Body() createUnitDto: CreateUnitDto, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.unitsService.create(createUnitDto, actorFrom(user, ip));
    }

    @Get()
    findAll(@Query() query: UnitQueryDto) {
        return this.unitsService.findAll(query);
    }

    @Get(':id/details')
    details(@Param('id', ParseUUIDPipe) id: string) {
        return this.unitsService.details(id);
    }

    @Get(':id')
    findOne(@Param('id', ParseUUIDPipe) id: string) {
        return this.unitsService.findOne(id);
    }

    @Roles(Role.CLERK)
    @Patch(':id')
    update(
        @Param('id', ParseUUIDPipe) id: string,
        @Body() updateUnitDto: UpdateUnitDto,
        @GetUser() user?: AuthUser,
        @RealIp() ip?: string,
    ) {
        return this.unitsService.update(id, updateUnitDto, actorFrom(user, ip));
    }

    @Roles(Role.ADMIN)
    @Delete(':id')
    remove(@Param('id', ParseUUIDPipe) id: string, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.unitsService.remove(id, actorFrom(user, ip));
    }
}
