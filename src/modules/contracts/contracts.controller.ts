import {
    Body, Controller, Delete, Get, HttpCode, Param, ParseUUIDPipe, Patch, Post, Query, Res,
    StreamableFile, UploadedFile, UseGuards, UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import type { Response } from 'express';
import { ContractsService } from './contracts.service';
import { CreateContractDto } from './dto/create-contract.dto';
import { UpdateContractDto } from './dto/update-contract.dto';
import { ContractQueryDto } from './dto/contract-query.dto';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { CsrfGuard } from '../../common/guards/csrf.guard';
import { RolesGuard } from '../../common/guards/roles.guard';
import { Roles } from '../../common/decorators/roles.decorator';
import { GetUser } from '../../common/decorators/get-user.decorator';
import { RealIp } from '../../common/decorators/real-ip.decorator';
import { Role } from '../users/role.enum';
import { AuthUser } from '../auth/auth-user';
import { actorFrom } from '../activity/actor';
import { contentDisposition } from '../storage/document-name';

@Controller('contracts')
@UseGuards(JwtAuthGuard, CsrfGuard, RolesGuard)
export class ContractsController {
    constructor(private readonly contractsService: ContractsService) { }

    @Roles(Role.CLERK)
    @Post()
    create(@Body() createContractDto: CreateContractDto, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.contractsService.create(createContractDto, actorFrom(user, ip));
    }

    @Get()
    findAll(@Query() query: ContractQueryDto) {
        return this.contractsService.findAll(query);
    }

    @Get(':id')
    findOne(@Param('id', ParseUUIDPipe) id: string) {
        return this.contractsService.findOne(id);
    }

    @Roles(Role.CLERK)
    @Patch(':id')
    update(
        @Param('id', ParseUUIDPipe) id: string,
        @Body() updateContractDto: UpdateContractDto,
        @GetUser() user?: AuthUser,
        @RealIp() ip?: string,
    ) {
        return this.contractsService.update(id, updateContractDto, actorFrom(user, ip));
    }

    @Roles(Role.CLERK)
    @Post(':id/end')
    @HttpCode(200)
    end(@Param('id', ParseUUIDPipe) id: string, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.contractsService.end(id, actorFrom(user, ip));
    }

    @Roles(Role.CLERK)
    @Post(':id/terminate')
    @HttpCode(200)
    terminate(@Param('id', ParseUUIDPipe) id: string, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.contractsService.terminate(id, actorFrom(user, ip));
    }

    @Roles(Role.ADMIN)
    @Delete(':id')
    remove(@Param('id', ParseUUIDPipe) id: string, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.contractsService.remove(id, actorFrom(user, ip));
    }

    @Roles(Role.CLERK)
    @Post(':id/document')
    @UseInterceptors(FileInterceptor('document'))
    uploadDocument(
        @Param('id', ParseUUIDPipe) id: string,
        @UploadedFile() file: Express.Multer.File | undefined,
        @GetUser() user?: AuthUser,
        @RealIp() ip?: string,
    ) {
        return this.contractsService.attachDocument(id, file, actorFrom(user, ip));
    }

    @Get(':id/document')
    async downloadDocument(@Param('id', ParseUUIDPipe) id: string, @Res({ passthrough: true }) res: Response) {
        const document = await this.contractsService.readDocument(id);
        res.set({
            'Content-Type': document.mimeType,
            'Content-Length': String(document.content.length),
            'Content-Disposition': contentDisposition(document.name, document.inline),
        });
        return new StreamableFile(document.content);
    }

    @Roles(Role.CLERK)
    @Delete(':id/document')
    removeDocument(@Param('id', ParseUUIDPipe) id: string, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.contractsService.removeDocument(id, actorFrom(user, ip));
    }
}
