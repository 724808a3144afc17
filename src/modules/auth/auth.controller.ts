import { Body, Controller, Get, HttpCode, HttpStatus, Post, Res, UseGuards } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CookieOptions, Response } from 'express';
import { AuthService } from './auth.service';
import { LoginDto } from './dto/login.dto';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { CsrfGuard } from '../../common/guards/csrf.guard';
import { GetUser } from '../../common/decorators/get-user.decorator';
import { RealIp } from '../../common/decorators/real-ip.decorator';
import { AuthUser } from './auth-user';
import { ACCESS_TOKEN_COOKIE, ACCESS_TOKEN_TTL_MS, CSRF_COOKIE } from './auth.constants';

@Controller('auth')
export class AuthController {
    constructor(
        private readonly authService: AuthService,
        private readonly configService: ConfigService,
    ) { }

    private cookieOptions(httpOnly: boolean): CookieOptions {
        const isProduction = this.configService.get<string>('nodeEnv') === 'production';
        return {
            httpOnly,
            secure: isProduction,
            sameSite: isProduction ? 'none' : 'lax',
            maxAge: ACCESS_TOKEN_TTL_MS,
        };
    }

    @Post('login')
    @HttpCode(HttpStatus.OK)
    async login(@Body() loginDto: LoginDto, @Res({ passthrough: true }) res: Response, @RealIp() ip?: string) {
        const result = await this.authService.login(loginDto, ip ?? 'unknown');

        res.cookie(ACCESS_TOKEN_COOKIE, result.accessToken, this.cookieOptions(true));
        // Readable by the frontend, which echoes it in the x-csrf-token header
        res.cookie(CSRF_COOKIE, result.csrfToken, this.cookieOptions(false));

        return result;
    }

    @UseGuards(JwtAuthGuard)
    @Get('me')
    getProfile(@GetUser() user?: AuthUser) {
        return user;
    }

    @UseGuards(JwtAuthGuard)
    @Get('csrf')
    refreshCsrf(@Res({ passthrough: true }) res: Response, @GetUser() user?: AuthUser) {
        const csrfToken = user ? this.authService.issueCsrfToken(user.id) : '';
        res.cookie(CSRF_COOKIE, csrfToken, this.cookieOptions(false));
        return { csrfToken };
    }

    @UseGuards(JwtAuthGuard, CsrfGuard)
    @Post('logout')
    @HttpCode(HttpStatus.OK)
    logout(@Res({ passthrough: true }) res: Response) {
        const { maxAge: _maxAge, ...clearOptions } = this.cookieOptions(true);
        res.clearCookie(ACCESS_TOKEN_COOKIE, clearOptions);
        res.clearCookie(CSRF_COOKIE, { ...clearOptions, httpOnly: false });
        return { message: 'Logged out' };
    }
}
