import { Module } from '@nestjs/common';
import { ContractExpiryService } from './contract-expiry.service';
import { ContractsModule } from '../contracts/contracts.module';

@Module({
    imports: [ContractsModule],
    providers: [ContractExpiryService],
    exports: [ContractExpiryService],
})
export class SchedulerModule { }
