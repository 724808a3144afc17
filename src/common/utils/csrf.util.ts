import * as crypto from 'crypto';

const NONCE_BYTES = 16;

function sign(secret: string, subject: string, nonce: string): string {
    return crypto.createHmac('sha256', secret).update(`${subject}.${nonce}`).digest('base64url');
}

/**
 * Token format: <hex nonce>.<base64url HMAC of "subject.nonce">
 * Bound to the session subject so a token from one user is useless to another.
 */
export function createCsrfToken(secret: string, subject: string): string {
    const nonce = crypto.randomBytes(NONCE_BYTES).toString('hex');
    return `${nonce}.${sign(secret, subject, nonce)}`;
}

export function verifyCsrfToken(secret: string, subject: string, token: string | undefined): boolean {
    if (!token) return false;
    const [nonce, signature, ...rest] = token.split('.');
    if (!nonce || !signature || rest.length > 0) return false;

    const expected = Buffer.from(sign(secret, subject, nonce));
    const received = Buffer.from(signature);
    if (expected.length !== received.length) return false;
    return crypto.timingSafeEqual(expected, received);
}
