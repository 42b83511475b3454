// src/client/uploadForm.ts

import { extensionOf } from '../utils/filename';
import { formatBytes } from '../utils/format';

export const DROP_REJECTED_MESSAGE = 'Please select a PDF file';

/** The parts of a browser `File` the upload form looks at. */
export interface PickedFile {
    name: string;
    size: number;
    type: string;
}

export interface FileSummary {
    name: string;
    size: string;
}

export type DropResult<T extends PickedFile> =
    | { kind: 'accepted'; file: T }
    | { kind: 'rejected'; message: string }
    | { kind: 'empty' };

export function isPdf(file: PickedFile): boolean {
    return file.type === 'application/pdf' || extensionOf(file.name) === '.pdf';
}

export function summarizeFile(file: PickedFile): FileSummary {
    return { name: file.name, size: formatBytes(file.size) };
}

/** Only the first dropped file is considered; the form takes a single PDF. */
export function chooseDroppedFile<T extends PickedFile>(files: ArrayLike<T>): DropResult<T> {
    if (files.length === 0) return { kind: 'empty' };
    const file = files[0];
    return isPdf(file) ? { kind: 'accepted', file } : { kind: 'rejected', message: DROP_REJECTED_MESSAGE };
}
