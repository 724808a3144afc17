export interface AppConfig {
    port: number;
    nodeEnv: string;
    debug: boolean;
    secretKey: string;
    csrfSecretKey: string;
    corsOrigins: string[];
    database: {
        url?: string;
        sqlitePath: string;
    };
    uploads: {
        dir: string;
        maxFileSizeBytes: number;
    };
    ledger: {
        defaultCompanyRateBp: number;
        defaultVatRateBp: number;
    };
    aws: {
        region?: string;
        accessKeyId?: string;
        secretAccessKey?: string;
        bucketName?: string;
    };
}

// Percent strings ("5", "15", "2.5") to basis points
function percentToBp(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? Math.round(parsed * 100) : fallback;
}

export default (): AppConfig => ({
    port: parseInt(process.env.PORT ?? '3001', 10),
    nodeEnv: process.env.NODE_ENV ?? 'development',
    debug: process.env.DEBUG === 'true',
    secretKey: process.env.SECRET_KEY ?? '',
    csrfSecretKey: process.env.CSRF_SECRET_KEY ?? '',
    corsOrigins: (process.env.CORS_ORIGINS ?? 'http://localhost:3000')
        .split(',')
        .map(origin => origin.trim())
        .filter(origin => origin.length > 0),
    database: {
        url: process.env.DATABASE_URL || undefined,
        sqlitePath: process.env.SQLITE_PATH ?? 'data/property.db',
    },
    uploads: {
        dir: process.env.UPLOAD_DIR ?? 'uploads/contracts',
        maxFileSizeBytes: 16 * 1024 * 1024,
    },
    ledger: {
        defaultCompanyRateBp: percentToBp(process.env.DEFAULT_COMPANY_RATE, 500),
        defaultVatRateBp: percentToBp(process.env.DEFAULT_VAT_RATE, 1500),
    },
    aws: {
        region: process.env.AWS_REGION || undefined,
        accessKeyId: process.env.AWS_ACCESS_KEY_ID || undefined,
        secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || undefined,
        bucketName: process.env.AWS_BUCKET_NAME || undefined,
    },
});
