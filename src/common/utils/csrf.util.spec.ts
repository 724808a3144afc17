import { createCsrfToken, verifyCsrfToken } from './csrf.util';

describe('csrf.util', () => {
    const secret = 'test-secret';

    it('accepts a token for the subject it was issued to', () => {
        const token = createCsrfToken(secret, 'user-1');
        expect(verifyCsrfToken(secret, 'user-1', token)).toBe(true);
    });

    it('rejects a token issued to someone else or under another secret', () => {
        const token = createCsrfToken(secret, 'user-1');
        expect(verifyCsrfToken(secret, 'user-2', token)).toBe(false);
        expect(verifyCsrfToken('other-secret', 'user-1', token)).toBe(false);
    });

    it('rejects missing and malformed tokens', () => {
        const [nonce] = createCsrfToken(secret, 'user-1').split('.');
        expect(verifyCsrfToken(secret, 'user-1', undefined)).toBe(false);
        expect(verifyCsrfToken(secret, 'user-1', nonce)).toBe(false);
        expect(verifyCsrfToken(secret, 'user-1', `${nonce}.forged`)).toBe(false);
        expect(verifyCsrfToken(secret, 'user-1', 'a.b.c')).toBe(false);
    });
});
