import { Controller, Get, Param, ParseUUIDPipe, Query, UseGuards } from '@nestjs/common';
import { BalancesService, balanceInSar, scheduleInSar } from './balances.service';
import { ScheduleQueryDto } from './dto/schedule-query.dto';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';

@Controller('balances')
@UseGuards(JwtAuthGuard)
export class BalancesController {
    constructor(private readonly balancesService: BalancesService) { }

    @Get('contracts/:id')
    async contract(@Param('id', ParseUUIDPipe) id: string) {
        return balanceInSar(await this.balancesService.forContract(id));
    }

    @Get('contracts/:id/schedule')
    async schedule(@Param('id', ParseUUIDPipe) id: string, @Query() query: ScheduleQueryDto) {
        return scheduleInSar(await this.balancesService.schedule(id, query.asOf));
    }

    @Get('units/:id')
    async unit(@Param('id', ParseUUIDPipe) id: string) {
        return balanceInSar(await this.balancesService.forUnit(id));
    }

    @Get('owners/:id')
    async owner(@Param('id', ParseUUIDPipe) id: string) {
        return balanceInSar(await this.balancesService.forOwner(id));
    }
}
