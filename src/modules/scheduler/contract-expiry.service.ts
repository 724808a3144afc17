import { Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { ContractsService } from '../contracts/contracts.service';
import { RIYADH_TIME_ZONE, todayDateOnly } from '../../common/utils/date-only.util';

@Injectable()
export class ContractExpiryService {
    private readonly logger = new Logger(ContractExpiryService.name);

    constructor(private contractsService: ContractsService) { }

    // 00:05 Riyadh time, once the previous day's contracts have run out
    @Cron('5 0 * * *', { name: 'contract-expiry', timeZone: RIYADH_TIME_ZONE })
    async handleCron() {
        try {
            await this.run();
        } catch (error) {
            this.logger.error('Contract expiry run failed', error instanceof Error ? error.stack : String(error));
        }
    }

    async run(today: string = todayDateOnly()): Promise<number> {
        this.logger.debug(`Checking for contracts ending before ${today}`);
        const expired = await this.contractsService.expireEnded(today);
        if (expired > 0) {
            this.logger.log(`Marked ${expired} contract(s) as ended`);
        }
        return expired;
    }
}
