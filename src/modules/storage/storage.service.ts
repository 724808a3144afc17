import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DeleteObjectCommand, GetObjectCommand, NoSuchKey, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import * as path from 'path';
import { AppConfig } from '../../config/configuration';

export type StorageDriver = 'local' | 's3';

/**
 * Stores contract documents under a flat key, on S3 when the AWS variables are all set
 * and in the upload directory otherwise.
 */
@Injectable()
export class StorageService {
    private readonly logger = new Logger(StorageService.name);
    private s3Client: S3Client | null = null;
    private bucketName = '';
    private readonly uploadDir: string;

    constructor(private configService: ConfigService) {
        this.uploadDir = path.resolve(this.configService.get<AppConfig['uploads']>('uploads')?.dir ?? 'uploads/contracts');

        const aws = this.configService.get<AppConfig['aws']>('aws');
        if (aws?.region && aws.accessKeyId && aws.secretAccessKey && aws.bucketName) {
            this.s3Client = new S3Client({
                region: aws.region,
                credentials: { accessKeyId: aws.accessKeyId, secretAccessKey: aws.secretAccessKey },
            });
            this.bucketName = aws.bucketName;
            this.logger.log(`Documents stored in S3 bucket ${aws.bucketName}`);
        } else {
            this.logger.log(`Documents stored in ${this.uploadDir}`);
        }
    }

    get driver(): StorageDriver {
        return this.s3Client ? 's3' : 'local';
    }

    async put(key: string, body: Buffer, contentType: string): Promise<void> {
        if (this.s3Client) {
            await this.s3Client.send(new PutObjectCommand({
                Bucket: this.bucketName,
                Key: key,
                Body: body,
                ContentType: contentType,
            }));
        } else {
            await mkdir(this.uploadDir, { recursive: true });
            await writeFile(this.localPath(key), body);
        }
        this.logger.debug(`Stored ${key} (${body.length} bytes)`);
    }

    async get(key: string): Promise<Buffer> {
        if (this.s3Client) {
            try {
                const result = await this.s3Client.send(new GetObjectCommand({ Bucket: this.bucketName, Key: key }));
                if (!result.Body) {
                    throw new NotFoundException(`Document ${key} not found`);
                }
                return Buffer.from(await result.Body.transformToByteArray());
            } catch (error) {
                if (error instanceof NoSuchKey) {
                    throw new NotFoundException(`Document ${key} not found`);
                }
                throw error;
            }
        }

        try {
            return await readFile(this.localPath(key));
        } catch (error) {
            if (isMissingFile(error)) {
                throw new NotFoundException(`Document ${key} not found`);
            }
            throw error;
        }
    }

    async delete(key: string): Promise<void> {
        if (this.s3Client) {
            await this.s3Client.send(new DeleteObjectCommand({ Bucket: this.bucketName, Key: key }));
        } else {
            await rm(this.localPath(key), { force: true });
        }
        this.logger.debug(`Deleted ${key}`);
    }

    // Keys never contain separators; basename keeps a crafted key inside the upload directory
    private localPath(key: string): string {
        return path.join(this.uploadDir, path.basename(key));
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
