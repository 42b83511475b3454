import { describe, expect, it } from 'vitest';
import { PanController } from './panController';

describe('PanController', () => {
    it('pans only above the default zoom', () => {
        const pan = new PanController();

        expect(pan.canPan(1.2)).toBe(false);
        expect(pan.canPan(1.5)).toBe(true);
        expect(pan.begin({ x: 0, y: 0 }, { x: 0, y: 0 }, 1.2, false)).toBe(false);
        expect(pan.isDragging).toBe(false);
    });

    it('does not start a drag on the text layer', () => {
        const pan = new PanController();

        expect(pan.begin({ x: 0, y: 0 }, { x: 0, y: 0 }, 2, true)).toBe(false);
    });

    it('scrolls opposite to the pointer movement', () => {
        const pan = new PanController();
        pan.begin({ x: 100, y: 100 }, { x: 50, y: 40 }, 2, false);

        expect(pan.move({ x: 130, y: 90 })).toEqual({ x: 20, y: 50 });
    });

    it('never scrolls below zero', () => {
        const pan = new PanController();
        pan.begin({ x: 100, y: 100 }, { x: 50, y: 40 }, 2, false);

        expect(pan.move({ x: 200, y: 300 })).toEqual({ x: 0, y: 0 });
    });

    it('stops tracking after the drag ends', () => {
        const pan = new PanController();
        pan.begin({ x: 0, y: 0 }, { x: 0, y: 0 }, 2, false);

        expect(pan.end()).toBe(true);
        expect(pan.end()).toBe(false);
        expect(pan.move({ x: 10, y: 10 })).toBeNull();
    });
});
