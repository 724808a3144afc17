import { Body, Controller, Delete, Get, HttpCode, Param, ParseUUIDPipe, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { PaymentsService } from './payments.service';
import { CreatePaymentDto } from './dto/create-payment.dto';
import { UpdatePaymentDto } from './dto/update-payment.dto';
import { PaymentFilterDto } from './dto/payment-filter.dto';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { CsrfGuard } from '../../common/guards/csrf.guard';
import { RolesGuard } from '../../common/guards/roles.guard';
import { Roles } from '../../common/decorators/roles.decorator';
import { GetUser } from '../../common/decorators/get-user.decorator';
import { RealIp } from '../../common/decorators/real-ip.decorator';
import { Role } from '../users/role.enum';
import { AuthUser } from '../auth/auth-user';
import { actorFrom } from '../activity/actor';
import { basisPointsToPercent, fromHalalas } from '../../common/utils/money.util';

@Controller('payments')
@UseGuards(JwtAuthGuard, CsrfGuard, RolesGuard)
export class PaymentsController {
    constructor(private readonly paymentsService: PaymentsService) { }

    @Roles(Role.ACCOUNTANT)
    @Post()
    record(@Body() createPaymentDto: CreatePaymentDto, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.paymentsService.record(createPaymentDto, actorFrom(user, ip));
    }

    @Get()
    findAll(@Query() query: PaymentFilterDto) {
        return this.paymentsService.findAll(query);
    }

    @Get(':id')
    findOne(@Param('id', ParseUUIDPipe) id: string) {
        return this.paymentsService.findOne(id);
    }

    @Roles(Role.ACCOUNTANT)
    @Patch(':id')
    update(
        @Param('id', ParseUUIDPipe) id: string,
        @Body() updatePaymentDto: UpdatePaymentDto,
        @GetUser() user?: AuthUser,
        @RealIp() ip?: string,
    ) {
        return this.paymentsService.update(id, updatePaymentDto, actorFrom(user, ip));
    }

    @Roles(Role.ACCOUNTANT)
    @Post(':id/recompute-commission')
    @HttpCode(200)
    async recomputeCommission(@Param('id', ParseUUIDPipe) id: string) {
        const commission = await this.paymentsService.recomputeCommission(id);
        return {
            paymentId: commission.paymentId,
            companyCommission: fromHalalas(commission.companyCommission),
            vatOnCommission: fromHalalas(commission.vatOnCommission),
            netToOwner: fromHalalas(commission.netToOwner),
            companyRate: basisPointsToPercent(commission.companyRateBp),
            vatRate: basisPointsToPercent(commission.vatRateBp),
            computedAt: commission.computedAt,
        };
    }

    @Roles(Role.ACCOUNTANT)
    @Delete(':id')
    remove(@Param('id', ParseUUIDPipe) id: string, @GetUser() user?: AuthUser, @RealIp() ip?: string) {
        return this.paymentsService.remove(id, actorFrom(user, ip));
    }
}
