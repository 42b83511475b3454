// src/client/panController.ts

import { DEFAULT_ZOOM } from './viewerSession';

export interface Point {
    x: number;
    y: number;
}

interface DragState {
    pointerStart: Point;
    scrollStart: Point;
}

/** Drag-to-pan for zoomed pages. Panning only applies above the default zoom. */
export class PanController {
    private drag: DragState | null = null;

    constructor(private readonly minScale: number = DEFAULT_ZOOM) {}

    public get isDragging(): boolean {
        return this.drag !== null;
    }

    public canPan(scale: number): boolean {
        return scale > this.minScale;
    }

    /** Starts a drag unless the page is not zoomed or the pointer is on selectable text. */
    public begin(pointer: Point, scroll: Point, scale: number, onTextLayer: boolean): boolean {
        if (!this.canPan(scale) || onTextLayer) return false;
        this.drag = { pointerStart: { ...pointer }, scrollStart: { ...scroll } };
        return true;
    }

    /** Scroll offset for the current pointer position, or null when no drag is active. */
    public move(pointer: Point): Point | null {
        if (!this.drag) return null;
        const deltaX = pointer.x - this.drag.pointerStart.x;
        const deltaY = pointer.y - this.drag.pointerStart.y;
        return {
            x: Math.max(0, this.drag.scrollStart.x - deltaX),
            y: Math.max(0, this.drag.scrollStart.y - deltaY),
        };
    }

    public end(): boolean {
        const wasDragging = this.drag !== null;
        this.drag = null;
        return wasDragging;
    }
}
