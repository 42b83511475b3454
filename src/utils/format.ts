// src/utils/format.ts

const SIZE_UNITS = ['Bytes', 'KB', 'MB', 'GB'];

export function formatBytes(bytes: number): string {
    if (bytes <= 0) return '0 Bytes';
    const exponent = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), SIZE_UNITS.length - 1);
    const value = bytes / Math.pow(1024, exponent);
    return `${parseFloat(value.toFixed(2))} ${SIZE_UNITS[exponent]}`;
}

export function formatDate(date: Date): string {
    return date.toISOString().slice(0, 16).replace('T', ' ');
}
