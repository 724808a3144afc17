import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import type { Request } from 'express';
import { UsersService } from '../../users/users.service';
import { AuthUser } from '../auth-user';
import { ACCESS_TOKEN_COOKIE } from '../auth.constants';

export interface JwtPayload {
    sub: string;
    username: string;
    role: string;
}

function fromCookie(request: Request): string | null {
    const cookies: unknown = request.cookies;
    if (typeof cookies !== 'object' || cookies === null || !(ACCESS_TOKEN_COOKIE in cookies)) {
        return null;
    }
    const token = cookies[ACCESS_TOKEN_COOKIE];
    return typeof token === 'string' ? token : null;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
    constructor(
        configService: ConfigService,
        private usersService: UsersService,
    ) {
        super({
            jwtFromRequest: ExtractJwt.fromExtractors([
                ExtractJwt.fromAuthHeaderAsBearerToken(),
                fromCookie,
            ]),
            ignoreExpiration: false,
            secretOrKey: configService.get<string>('secretKey') ?? '',
            passReqToCallback: true,
        });
    }

    async validate(request: Request, payload: JwtPayload): Promise<AuthUser> {
        const user = await this.usersService.findOptionalById(payload.sub);
        if (!user || !user.isActive) {
            throw new UnauthorizedException();
        }

        const bearer = ExtractJwt.fromAuthHeaderAsBearerToken()(request);
        return {
            id: user.id,
            username: user.username,
            fullName: user.fullName,
            role: user.role,
            via: bearer ? 'bearer' : 'cookie',
        };
    }
}
