export const ACCESS_TOKEN_COOKIE = 'access_token';
export const CSRF_COOKIE = 'csrf_token';
export const ACCESS_TOKEN_TTL_MS = 24 * 60 * 60 * 1000;
