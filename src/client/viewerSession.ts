// src/client/viewerSession.ts
// Per-document viewer state: page, zoom and the single-flight render pipeline.

export const MIN_ZOOM = 0.5;
export const MAX_ZOOM = 3.0;
export const DEFAULT_ZOOM = 1.2;
export const ZOOM_IN_FACTOR = 1.25;
export const ZOOM_OUT_FACTOR = 0.8;

export type ViewerStatus = 'loading' | 'ready' | 'error' | 'closed';

/** What the session needs from a PDF engine; the browser build backs it with pdf.js. */
export interface PageRenderer {
    /** Fetches the document and resolves with its page count. */
    load(): Promise<number>;
    /** Draws the page and its text layer at the given scale. */
    renderPage(pageNumber: number, scale: number): Promise<void>;
    destroy?(): Promise<void>;
}

export interface ViewerSnapshot {
    status: ViewerStatus;
    currentPage: number;
    totalPages: number;
    zoomScale: number;
    rendering: boolean;
    progress: number;
    error?: string;
}

export type ViewerListener = (snapshot: ViewerSnapshot) => void;

// rounded so that zooming in and back out lands exactly on the default scale
export function clampZoom(scale: number): number {
    return Math.min(MAX_ZOOM, Math.max(MIN_ZOOM, Math.round(scale * 1000) / 1000));
}

export class ViewerSession {
    private status: ViewerStatus = 'loading';
    private currentPage = 1;
    private totalPages = 1;
    private zoomScale = DEFAULT_ZOOM;
    private rendering = false;
    private error?: string;
    private listeners = new Set<ViewerListener>();

    constructor(private readonly renderer: PageRenderer) {}

    public subscribe(listener: ViewerListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    public snapshot(): ViewerSnapshot {
        return {
            status: this.status,
            currentPage: this.currentPage,
            totalPages: this.totalPages,
            zoomScale: this.zoomScale,
            rendering: this.rendering,
            progress: this.currentPage / this.totalPages,
            ...(this.error ? { error: this.error } : {}),
        };
    }

    /** loading -> ready (and first page drawn) or loading -> error. */
    public async open(): Promise<void> {
        if (this.status !== 'loading') return;

        let pageCount: number;
        try {
            pageCount = await this.renderer.load();
        } catch (error) {
            this.fail(error);
            return;
        }
        // close() may have run while the document was loading
        if (!this.is('loading')) return;
        if (!Number.isInteger(pageCount) || pageCount < 1) {
            this.fail(new Error('Document has no pages'));
            return;
        }

        this.totalPages = pageCount;
        this.status = 'ready';
        this.emit();
        await this.render(1);
    }

    /**
     * Draws `pageNumber`. A request that arrives while another render is in flight is dropped,
     * not queued; the result says whether this call drew anything.
     */
    public async render(pageNumber: number): Promise<boolean> {
        if (this.status !== 'ready' || this.rendering) return false;
        if (!Number.isInteger(pageNumber) || pageNumber < 1 || pageNumber > this.totalPages) return false;

        this.rendering = true;
        this.emit();
        try {
            await this.renderer.renderPage(pageNumber, this.zoomScale);
            if (!this.is('ready')) return false;
            this.currentPage = pageNumber;
            this.error = undefined;
            return true;
        } catch (error) {
            this.error = error instanceof Error ? error.message : String(error);
            return false;
        } finally {
            this.rendering = false;
            this.emit();
        }
    }

    public next(): Promise<boolean> {
        if (this.currentPage >= this.totalPages) return Promise.resolve(false);
        return this.render(this.currentPage + 1);
    }

    public previous(): Promise<boolean> {
        if (this.currentPage <= 1) return Promise.resolve(false);
        return this.render(this.currentPage - 1);
    }

    public zoomIn(): Promise<boolean> {
        return this.setZoom(this.zoomScale * ZOOM_IN_FACTOR);
    }

    public zoomOut(): Promise<boolean> {
        return this.setZoom(this.zoomScale * ZOOM_OUT_FACTOR);
    }

    public resetZoom(): Promise<boolean> {
        return this.setZoom(DEFAULT_ZOOM);
    }

    public async close(): Promise<void> {
        if (this.status === 'closed') return;
        this.status = 'closed';
        this.emit();
        this.listeners.clear();
        await this.renderer.destroy?.();
    }

    private setZoom(scale: number): Promise<boolean> {
        if (this.status !== 'ready') return Promise.resolve(false);
        this.zoomScale = clampZoom(scale);
        this.emit();
        return this.render(this.currentPage);
    }

    private is(status: ViewerStatus): boolean {
        return this.status === status;
    }

    private fail(error: unknown): void {
        this.status = 'error';
        this.error = error instanceof Error ? error.message : String(error);
        this.emit();
    }

    private emit(): void {
        const snapshot = this.snapshot();
        for (const listener of this.listeners) {
            listener(snapshot);
        }
    }
}
