import { plainToInstance } from 'class-transformer';
import { IsIn, IsNumberString, IsOptional, IsString, MinLength, validateSync } from 'class-validator';

export class EnvironmentVariables {
    @IsString()
    @MinLength(16)
    SECRET_KEY!: string;

    @IsString()
    @MinLength(16)
    CSRF_SECRET_KEY!: string;

    @IsOptional()
    @IsIn(['development', 'production', 'test'])
    NODE_ENV?: string;

    @IsOptional()
    @IsIn(['true', 'false'])
    DEBUG?: string;

    @IsOptional()
    @IsString()
    DATABASE_URL?: string;

    @IsOptional()
    @IsNumberString()
    PORT?: string;

    @IsOptional()
    @IsNumberString()
    DEFAULT_COMPANY_RATE?: string;

    @IsOptional()
    @IsNumberString()
    DEFAULT_VAT_RATE?: string;
}

export function validateEnv(config: Record<string, unknown>) {
    const validated = plainToInstance(EnvironmentVariables, config, {
        enableImplicitConversion: false,
    });
    const errors = validateSync(validated, { skipMissingProperties: false });

    if (errors.length > 0) {
        const details = errors
            .map(error => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${details}`);
    }
    return config;
}
