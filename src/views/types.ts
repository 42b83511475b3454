// src/views/types.ts

export interface RecentFileView {
    key: string;
    displayName: string;
    modifiedAt: Date;
    sizeBytes: number;
}

export interface UploadPageModel {
    recentFiles: RecentFileView[];
    error?: string;
    maxUploadBytes: number;
}

export interface ViewerPageModel {
    fileKey: string;
    displayName: string;
    pdfUrl: string;
}
