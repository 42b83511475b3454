import { describe, expect, it } from 'vitest';
import { formatBytes, formatDate } from './format';

describe('format', () => {
    it('formats byte counts', () => {
        expect(formatBytes(0)).toBe('0 Bytes');
        expect(formatBytes(500)).toBe('500 Bytes');
        expect(formatBytes(1536)).toBe('1.5 KB');
    });

    it('formats dates in UTC', () => {
        expect(formatDate(new Date(Date.UTC(2024, 0, 2, 3, 4)))).toBe('2024-01-02 03:04');
    });
});
