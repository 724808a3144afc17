import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';

export function resolveClientIp(request: Request): string | undefined {
    const forwarded = request.headers['x-forwarded-for'];
    const first = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    if (first) {
        return first.split(',')[0].trim();
    }
    return request.ip || request.socket.remoteAddress;
}

export const RealIp = createParamDecorator((_data: unknown, ctx: ExecutionContext): string | undefined => {
    return resolveClientIp(ctx.switchToHttp().getRequest<Request>());
});
