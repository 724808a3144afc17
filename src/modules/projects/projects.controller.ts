import { Body, Controller, Delete, Get, Param, ParseUUIDPipe, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { ProjectsService } from './projects.service';
import { CreateProjectDto } from './dto/create-project.dto';
import { UpdateProjectDto } from './dto/update-project.dto';
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

@Controller('projects')
@UseGuards(JwtAuthGuard, CsrfGuard, RolesGuard)
export class ProjectsController {
    constructor(private readonly projectsService: ProjectsService) { }

    @Roles(Role.CLERK)
    @Post()
    create(@Body() createProjectDto: CreateProjectDto, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.projectsService.create(createProjectDto, actorFrom(user, ip));
    }

    @Get()
    findAll(@Query() query: PaginationQueryDto) {
        return this.projectsService.findAll(query);
    }

    @Get(':id')
    findOne(@Param('id', ParseUUIDPipe) id: string) {
        return this.projectsService.findOne(id);
    }

    @Roles(Role.CLERK)
    @Patch(':id')
    update(
        @Param('id', ParseUUIDPipe) id: string,
        @Body() updateProjectDto: UpdateProjectDto,
        @GetUser() user?: AuthUser,
        @RealIp() ip?: string,
    ) {
        return this.projectsService.update(id, updateProjectDto, actorFrom(user, ip));
    }

    @Roles(Role.ADMIN)
    @Delete(':id')
    remove(@Param('id', ParseUUIDPipe) id: string, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.projectsService.remove(id, actorFrom(user, ip));
    }
}
