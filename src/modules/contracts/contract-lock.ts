import { NotFoundException } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { Contract } from './entities/contract.entity';

/**
 * Reads the contract inside a transaction, holding its row lock on PostgreSQL until commit.
 * Every change to a contract's payments or obligation takes this lock first.
 */
export async function lockContract(manager: EntityManager, contractId: string): Promise<Contract> {
    const qb = manager.getRepository(Contract).createQueryBuilder('contract')
        .where('contract.id = :contractId', { contractId });
    if (manager.connection.options.type === 'postgres') {
        qb.setLock('pessimistic_write');
    }
    const contract = await qb.getOne();
    if (!contract) {
        throw new NotFoundException(`Contract with ID ${contractId} not found`);
    }
    return contract;
}
