// src/client/pdfRenderer.ts

import { GlobalWorkerOptions, TextLayer, getDocument } from 'pdfjs-dist';
import type { PDFDocumentProxy } from 'pdfjs-dist';
import type { PageRenderer } from './viewerSession';

export interface PdfRendererElements {
    canvas: HTMLCanvasElement;
    textLayer: HTMLElement;
}

export function configurePdfWorker(workerSrc: string): void {
    GlobalWorkerOptions.workerSrc = workerSrc;
}

/**
 * pdf.js-backed renderer: the canvas is drawn at device resolution and displayed at the
 * zoom scale, and a transparent text layer is laid over it so the page stays selectable.
 */
export class PdfJsRenderer implements PageRenderer {
    private document: PDFDocumentProxy | null = null;
    private textLayer: TextLayer | null = null;

    constructor(
        private readonly url: string,
        private readonly elements: PdfRendererElements,
    ) {}

    public async load(): Promise<number> {
        this.document = await getDocument(this.url).promise;
        return this.document.numPages;
    }

    public async renderPage(pageNumber: number, scale: number): Promise<void> {
        if (!this.document) {
            throw new Error('PDF document is not loaded');
        }
        const page = await this.document.getPage(pageNumber);
        const { canvas, textLayer } = this.elements;

        const outputScale = window.devicePixelRatio || 1;
        const viewport = page.getViewport({ scale });
        const renderViewport = page.getViewport({ scale: scale * outputScale });

        const context = canvas.getContext('2d');
        if (!context) {
            throw new Error('Canvas 2D context is unavailable');
        }
        canvas.width = Math.floor(renderViewport.width);
        canvas.height = Math.floor(renderViewport.height);
        canvas.style.width = `${Math.floor(viewport.width)}px`;
        canvas.style.height = `${Math.floor(viewport.height)}px`;
        context.setTransform(1, 0, 0, 1, 0, 0);

        await page.render({ canvasContext: context, viewport: renderViewport }).promise;

        this.textLayer?.cancel();
        textLayer.replaceChildren();
        textLayer.style.width = `${Math.floor(viewport.width)}px`;
        textLayer.style.height = `${Math.floor(viewport.height)}px`;
        textLayer.style.setProperty('--scale-factor', String(scale));

        this.textLayer = new TextLayer({
            textContentSource: page.streamTextContent(),
            container: textLayer,
            viewport,
        });
        await this.textLayer.render();
    }

    public async destroy(): Promise<void> {
        this.textLayer?.cancel();
        this.textLayer = null;
        await this.document?.destroy();
        this.document = null;
    }
}
