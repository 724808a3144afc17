import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StorageService } from './storage.service';

describe('StorageService (local)', () => {
    let dir: string;
    let storage: StorageService;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'storage-'));
        storage = new StorageService(new ConfigService({ uploads: { dir, maxFileSizeBytes: 1024 }, aws: {} }));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('uses the upload directory without AWS settings', () => {
        expect(storage.driver).toBe('local');
    });

    it('writes, reads and deletes a document', async () => {
        await storage.put('1_lease.pdf', Buffer.from('contents'), 'application/pdf');
        expect(existsSync(join(dir, '1_lease.pdf'))).toBe(true);
        expect((await storage.get('1_lease.pdf')).toString()).toBe('contents');

        await storage.delete('1_lease.pdf');
        expect(existsSync(join(dir, '1_lease.pdf'))).toBe(false);
    });

    it('reports a missing document as not found', async () => {
        await expect(storage.get('missing.pdf')).rejects.toBeInstanceOf(NotFoundException);
    });

    it('keeps keys inside the upload directory', async () => {
        await storage.put('../escape.txt', Buffer.from('x'), 'text/plain');
        expect(existsSync(join(dir, 'escape.txt'))).toBe(true);
    });

    it('ignores deleting a document that is already gone', async () => {
        await expect(storage.delete('missing.pdf')).resolves.toBeUndefined();
    });
});
