import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WheelNavigator, type PageDirection } from './wheelNavigator';

describe('WheelNavigator', () => {
    let turns: PageDirection[];
    let wheel: WheelNavigator;

    beforeEach(() => {
        vi.useFakeTimers();
        turns = [];
        wheel = new WheelNavigator((direction) => turns.push(direction));
    });

    afterEach(() => {
        wheel.dispose();
        vi.useRealTimers();
    });

    it('waits until the accumulated delta crosses the threshold', () => {
        wheel.handleWheel(60);
        wheel.handleWheel(30);
        expect(turns).toEqual([]);
        expect(wheel.pendingDelta).toBe(90);

        wheel.handleWheel(20);
        expect(turns).toEqual(['next']);
        expect(wheel.pendingDelta).toBe(0);
    });

    it('turns back on upward scrolling', () => {
        wheel.handleWheel(-120);

        expect(turns).toEqual(['previous']);
    });

    it('fires once per gesture during the cooldown', () => {
        wheel.handleWheel(150);
        wheel.handleWheel(150);
        expect(turns).toEqual(['next']);
        expect(wheel.isLocked).toBe(true);

        vi.advanceTimersByTime(300);
        expect(wheel.isLocked).toBe(false);

        wheel.handleWheel(1);
        expect(turns).toEqual(['next', 'next']);
    });

    it('forgets the accumulated delta after a quiet period', () => {
        wheel.handleWheel(80);
        vi.advanceTimersByTime(500);
        expect(wheel.pendingDelta).toBe(0);

        wheel.handleWheel(80);
        expect(turns).toEqual([]);
    });

    it('keeps accumulating while wheel events keep arriving', () => {
        wheel.handleWheel(60);
        vi.advanceTimersByTime(400);
        wheel.handleWheel(60);

        expect(turns).toEqual(['next']);
    });

    it('can be locked externally and released after a delay', () => {
        wheel.lock();
        wheel.handleWheel(200);
        expect(turns).toEqual([]);

        wheel.unlockAfter(500);
        vi.advanceTimersByTime(499);
        expect(wheel.isLocked).toBe(true);
        vi.advanceTimersByTime(1);
        expect(wheel.isLocked).toBe(false);
    });

    it('shows the scroll hint for a fixed time', () => {
        const hints: boolean[] = [];
        const hinted = new WheelNavigator(() => undefined, { hintMs: 3000 }, (visible) => hints.push(visible));

        hinted.showHint();
        vi.advanceTimersByTime(2999);
        expect(hints).toEqual([true]);

        vi.advanceTimersByTime(1);
        expect(hints).toEqual([true, false]);
        hinted.dispose();
    });

    it('restarts the hint timer when shown again', () => {
        const hints: boolean[] = [];
        const hinted = new WheelNavigator(() => undefined, {}, (visible) => hints.push(visible));

        hinted.showHint();
        vi.advanceTimersByTime(2000);
        hinted.showHint();
        vi.advanceTimersByTime(2000);
        expect(hints).toEqual([true, true]);

        vi.advanceTimersByTime(1000);
        expect(hints).toEqual([true, true, false]);
        hinted.dispose();
    });

    it('cancels a visible hint on dispose', () => {
        const hints: boolean[] = [];
        const hinted = new WheelNavigator(() => undefined, {}, (visible) => hints.push(visible));

        hinted.showHint();
        hinted.dispose();
        vi.runAllTimers();

        expect(hints).toEqual([true]);
    });
});
