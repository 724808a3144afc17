import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import { isUniqueViolation } from '../../database/unique-violation';

interface ErrorBody {
    statusCode: number;
    message: string | string[];
    error: string;
    path: string;
    timestamp: string;
}

function readMessage(response: string | object, fallback: string): string | string[] {
    if (typeof response === 'string') return response;
    if ('message' in response) {
        const message = response.message;
        if (typeof message === 'string') return message;
        if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) return message;
    }
    return fallback;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(HttpExceptionFilter.name);

    catch(exception: unknown, host: ArgumentsHost) {
        const ctx = host.switchToHttp();
        const response = ctx.getResponse<Response>();
        const request = ctx.getRequest<Request>();

        let status = HttpStatus.INTERNAL_SERVER_ERROR;
        let message: string | string[] = 'Internal server error';

        if (exception instanceof HttpException) {
            status = exception.getStatus();
            message = readMessage(exception.getResponse(), exception.message);
        } else if (isUniqueViolation(exception)) {
            status = HttpStatus.CONFLICT;
            message = 'A record with the same unique value already exists';
        }

        if (status >= 500) {
            const stack = exception instanceof Error ? exception.stack : String(exception);
            this.logger.error(`${request.method} ${request.url} failed`, stack);
        }

        const body: ErrorBody = {
            statusCode: status,
            message,
            error: HttpStatus[status] ?? 'Error',
            path: request.url,
            timestamp: new Date().toISOString(),
        };
        response.status(status).json(body);
    }
}
