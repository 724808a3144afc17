import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { AuditLog } from './entities/audit-log.entity';
import { Actor } from './actor';
import { Paginated, pageWindow, toPage } from '../../common/utils/pagination';

export interface ActivityEntry {
    action: string;
    entityType?: string;
    entityId?: string;
}

@Injectable()
export class ActivityService {
    constructor(
        @InjectRepository(AuditLog)
        private auditLogs: Repository<AuditLog>,
    ) { }

    /**
     * Pass the transaction's manager so the entry commits or rolls back with the change it describes.
     */
    async create(entry: ActivityEntry, actor: Actor, manager?: EntityManager): Promise<AuditLog> {
        const repository = manager ? manager.getRepository(AuditLog) : this.auditLogs;
        const log = repository.create({
            action: entry.action.slice(0, 255),
            entityType: entry.entityType ?? null,
            entityId: entry.entityId ?? null,
            userId: actor.userId,
            username: actor.username,
            ipAddress: actor.ipAddress,
        });
        return repository.save(log);
    }

    async findAll(query: { page?: number; perPage?: number; entityType?: string }): Promise<Paginated<AuditLog>> {
        const { page, perPage, skip, take } = pageWindow(query);
        const [items, total] = await this.auditLogs.findAndCount({
            where: query.entityType ? { entityType: query.entityType } : {},
            order: { createdAt: 'DESC' },
            skip,
            take,
        });
        return toPage(items, total, page, perPage);
    }

    async recent(limit = 10): Promise<AuditLog[]> {
        return this.auditLogs.find({ order: { createdAt: 'DESC' }, take: limit });
    }
}
