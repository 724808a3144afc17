import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { UsersService } from '../users/users.service';
import { LoginThrottleService } from './login-throttle.service';
import { ActivityService } from '../activity/activity.service';
import { LoginDto } from './dto/login.dto';
import { JwtPayload } from './strategies/jwt.strategy';
import { createCsrfToken } from '../../common/utils/csrf.util';
import { User } from '../users/entities/user.entity';

export interface LoginResult {
    user: User;
    accessToken: string;
    csrfToken: string;
}

@Injectable()
export class AuthService {
    private readonly logger = new Logger(AuthService.name);

    constructor(
        private usersService: UsersService,
        private jwtService: JwtService,
        private configService: ConfigService,
        private throttle: LoginThrottleService,
        private activityService: ActivityService,
    ) { }

    async login(loginDto: LoginDto, ipAddress: string): Promise<LoginResult> {
        const username = loginDto.username.trim();
        await this.throttle.assertNotLocked(username, ipAddress);

        const account = await this.usersService.findForLogin(username);
        const valid = account !== null
            && account.isActive
            && await bcrypt.compare(loginDto.password, account.password);

        if (!account || !valid) {
            await this.throttle.recordFailure(username, ipAddress);
            this.logger.warn(`Failed login for ${username} from ${ipAddress}`);
            throw new UnauthorizedException('Invalid credentials');
        }

        await this.throttle.reset(username, ipAddress);

        const payload: JwtPayload = { sub: account.id, username: account.username, role: account.role };
        const accessToken = await this.jwtService.signAsync(payload);
        const csrfToken = this.issueCsrfToken(account.id);

        await this.activityService.create(
            { action: `Logged in: ${account.username}`, entityType: 'user', entityId: account.id },
            { userId: account.id, username: account.username, ipAddress },
        );

        return { user: await this.usersService.findById(account.id), accessToken, csrfToken };
    }

    issueCsrfToken(userId: string): string {
        return createCsrfToken(this.configService.get<string>('csrfSecretKey') ?? '', userId);
    }
}
