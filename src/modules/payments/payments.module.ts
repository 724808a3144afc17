import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Payment } from './entities/payment.entity';
import { Commission } from './entities/commission.entity';
import { Contract } from '../contracts/entities/contract.entity';
import { Unit } from '../units/entities/unit.entity';
import { Owner } from '../owners/entities/owner.entity';
import { PaymentsService } from './payments.service';
import { BalancesService } from './balances.service';
import { PaymentsController } from './payments.controller';
import { BalancesController } from './balances.controller';
import { ActivityModule } from '../activity/activity.module';

@Module({
    imports: [TypeOrmModule.forFeature([Payment, Commission, Contract, Unit, Owner]), ActivityModule],
    controllers: [PaymentsController, BalancesController],
    providers: [PaymentsService, BalancesService],
    exports: [PaymentsService, BalancesService],
})
export class PaymentsModule { }
