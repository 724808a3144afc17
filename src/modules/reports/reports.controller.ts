import { BadRequestException, Controller, Get, Param, Query, Res, StreamableFile, UseGuards } from '@nestjs/common';
import type { Response } from 'express';
import { ReportsService } from './reports.service';
import { ReportFilterDto } from './dto/report-filter.dto';
import { REPORT_FORMATS, ReportFormat } from './report.types';
import { rowInSar, summaryInSar } from './report.view';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { RolesGuard } from '../../common/guards/roles.guard';
import { Roles } from '../../common/decorators/roles.decorator';
import { Role } from '../users/role.enum';

function isReportFormat(value: string): value is ReportFormat {
    return REPORT_FORMATS.some(format => format === value);
}

@Controller('reports')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(Role.ACCOUNTANT)
export class ReportsController {
    constructor(private readonly reportsService: ReportsService) { }

    @Get('summary')
    async summary(@Query() filter: ReportFilterDto) {
        return summaryInSar(await this.reportsService.summary(filter));
    }

    @Get('payments')
    async payments(@Query() filter: ReportFilterDto) {
        const rows = await this.reportsService.rows(filter);
        return rows.map(rowInSar);
    }

    @Get('export/:format')
    async export(
        @Param('format') format: string,
        @Query() filter: ReportFilterDto,
        @Res({ passthrough: true }) res: Response,
    ) {
        if (!isReportFormat(format)) {
            throw new BadRequestException(`Unknown report format "${format}"; use one of ${REPORT_FORMATS.join(', ')}`);
        }

        const report = await this.reportsService.render(format, filter);
        res.set({
            'Content-Type': report.contentType,
            'Content-Disposition': `attachment; filename="${report.fileName}"`,
        });
        return new StreamableFile(report.content);
    }
}
