// src/utils/filename.ts

const UUID_LENGTH = 36;
const FALLBACK_NAME = 'document.pdf';

const SAFE_EXTENSION = /^\.[a-z0-9]+$/;

/**
 * Reduces a client-supplied file name to a safe basename: directory components are dropped,
 * accents are folded to ASCII, whitespace becomes `_`, anything outside `[A-Za-z0-9._-]`
 * is removed and runs of dots collapse to one. A name whose stem is lost keeps its
 * extension as `document{ext}`.
 */
export function sanitizeFilename(originalName: string): string {
    const base = originalName.split(/[/\\]/).pop() ?? '';
    const cleaned = base
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .replace(/\s+/g, '_')
        .replace(/[^A-Za-z0-9._-]/g, '')
        .replace(/\.{2,}/g, '.')
        .replace(/^[._]+|[._]+$/g, '');

    const extension = extensionOf(base);
    if (SAFE_EXTENSION.test(extension) && extensionOf(cleaned) !== extension) {
        return `document${extension}`;
    }
    return cleaned || FALLBACK_NAME;
}

export function extensionOf(fileName: string): string {
    const dot = fileName.lastIndexOf('.');
    return dot > 0 ? fileName.slice(dot).toLowerCase() : '';
}

/** Splits `{uuid}_{name}` into its parts; keys without a 36-char prefix are their own display name. */
export function parseFileKey(key: string): { id: string; displayName: string } {
    const separator = key.indexOf('_');
    if (separator === UUID_LENGTH) {
        return { id: key.slice(0, separator), displayName: key.slice(separator + 1) };
    }
    return { id: key, displayName: key };
}

export function displayNameFor(key: string): string {
    return parseFileKey(key).displayName;
}
