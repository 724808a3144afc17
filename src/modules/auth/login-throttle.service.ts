import { HttpException, HttpStatus, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { LoginAttempt } from './entities/login-attempt.entity';

export const MAX_LOGIN_ATTEMPTS = 5;
export const LOCK_DURATION_MS = 15 * 60 * 1000;

/**
 * Per username + IP lock after repeated failures.
 */
@Injectable()
export class LoginThrottleService {
    private readonly logger = new Logger(LoginThrottleService.name);

    constructor(
        @InjectRepository(LoginAttempt)
        private attempts: Repository<LoginAttempt>,
    ) { }

    async assertNotLocked(username: string, ipAddress: string, now: number = Date.now()) {
        const record = await this.attempts.findOne({ where: { username, ipAddress } });
        if (record?.lockedUntil && record.lockedUntil > now) {
            const minutes = Math.ceil((record.lockedUntil - now) / 60000);
            throw new HttpException(
                `Too many failed login attempts. Try again in ${minutes} minute(s).`,
                HttpStatus.TOO_MANY_REQUESTS,
            );
        }
    }

    async recordFailure(username: string, ipAddress: string, now: number = Date.now()) {
        const record = await this.attempts.findOne({ where: { username, ipAddress } })
            ?? this.attempts.create({ username, ipAddress, attempts: 0, lockedUntil: null });

        // A lock that has run out starts a fresh count
        if (record.lockedUntil && record.lockedUntil <= now) {
            record.attempts = 0;
            record.lockedUntil = null;
        }

        record.attempts += 1;
        if (record.attempts >= MAX_LOGIN_ATTEMPTS) {
            record.lockedUntil = now + LOCK_DURATION_MS;
            this.logger.warn(`Login locked for ${username} from ${ipAddress}`);
        }
        await this.attempts.save(record);
    }

    async reset(username: string, ipAddress: string) {
        await this.attempts.delete({ username, ipAddress });
    }
}
