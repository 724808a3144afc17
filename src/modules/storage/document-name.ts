import { v4 as uuidv4 } from 'uuid';

// Keeps ASCII letters, digits, dot, dash and underscore; spaces and separators become underscores
export function sanitizeFileName(name: string): string {
    const ascii = name.normalize('NFKD').replace(/[^\x20-\x7e]/g, '');
    const cleaned = ascii
        .replace(/[/\\]/g, ' ')
        .split(/\s+/)
        .filter(part => part.length > 0)
        .join('_')
        .replace(/[^A-Za-z0-9_.-]/g, '')
        .replace(/^[._]+/, '');
    return cleaned.length > 0 ? cleaned : 'document';
}

// Unique per upload: two contracts may send the same file name within one second
export function documentKey(originalName: string, now: Date = new Date(), id: string = uuidv4()): string {
    return `${Math.floor(now.getTime() / 1000)}_${id}_${sanitizeFileName(originalName)}`;
}

const INLINE_EXTENSIONS = new Set(['pdf', 'jpg', 'jpeg', 'png', 'gif']);

export function isInlineViewable(fileName: string): boolean {
    const dot = fileName.lastIndexOf('.');
    if (dot < 0) return false;
    return INLINE_EXTENSIONS.has(fileName.substring(dot + 1).toLowerCase());
}

export function contentDisposition(fileName: string, inline: boolean): string {
    const fallback = fileName.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
    return `${inline ? 'inline' : 'attachment'}; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}
