// src/models/stored-file.model.ts

export interface StoredFile {
    /** Generated UUID; the part of the key before the first underscore. */
    id: string;
    /** `{id}_{sanitizedName}`, the on-disk file name and the public handle. */
    key: string;
    originalName: string;
    displayName: string;
    storagePath: string;
    uploadedAt: Date;
    sizeBytes: number;
}
