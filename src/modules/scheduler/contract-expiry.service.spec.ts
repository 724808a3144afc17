import { Test } from '@nestjs/testing';
import { ContractExpiryService } from './contract-expiry.service';
import { ContractsService } from '../contracts/contracts.service';

describe('ContractExpiryService', () => {
    const expireEnded = jest.fn<Promise<number>, [string]>();
    let service: ContractExpiryService;

    beforeEach(async () => {
        expireEnded.mockReset();
        const moduleRef = await Test.createTestingModule({
            providers: [
                ContractExpiryService,
                { provide: ContractsService, useValue: { expireEnded } },
            ],
        }).compile();
        service = moduleRef.get(ContractExpiryService);
    });

    it('expires the contracts that ended before the given day', async () => {
        expireEnded.mockResolvedValue(2);

        await expect(service.run('2025-01-01')).resolves.toBe(2);
        expect(expireEnded).toHaveBeenCalledWith('2025-01-01');
    });

    it('logs a failed run instead of rejecting', async () => {
        expireEnded.mockRejectedValue(new Error('database unavailable'));

        await expect(service.handleCron()).resolves.toBeUndefined();
        expect(expireEnded).toHaveBeenCalledTimes(1);
    });
});
