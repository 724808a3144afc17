import { Body, Controller, Delete, Get, Param, ParseUUIDPipe, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { OwnersService } from './owners.service';
import { CreateOwnerDto } from './dto/create-owner.dto';
import { UpdateOwnerDto } from './dto/update-owner.dto';
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

@Controller('owners')
@UseGuards(JwtAuthGuard, CsrfGuard, RolesGuard)
export class OwnersController {
    constructor(private readonly ownersService: OwnersService) { }

    @Roles(Role.CLERK)
    @Post()
    create(@Body() createOwnerDto: CreateOwnerDto, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.ownersService.create(createOwnerDto, actorFrom(user, ip));
    }

    @Get()
    findAll(@Query() query: PaginationQueryDto) {
        return this.ownersService.findAll(query);
    }

    @Get(':id')
    findOne(@Param('id', ParseUUIDPipe) id: string) {
        return this.ownersService.findOne(id);
    }

    @Roles(Role.CLERK)
    @Patch(':id')
    update(
        @Param('id', ParseUUIDPipe) id: string,
        @Body() updateOwnerDto: UpdateOwnerDto,
        @GetUser() user?: AuthUser,
        @RealIp() ip?: string,
    ) {
        return this.ownersService.update(id, updateOwnerDto, actorFrom(user, ip));
    }

    @Roles(Role.ADMIN)
    @Delete(':id')
    remove(@Param('id', ParseUUIDPipe) id: string, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.ownersService.remove(id, actorFrom(user, ip));
    }
}
