// src/client/wheelNavigator.ts

export type PageDirection = 'next' | 'previous';

export interface WheelNavigatorOptions {
    threshold: number;
    cooldownMs: number;
    quietMs: number;
    /** How long `showHint` keeps the scroll hint visible. */
    hintMs: number;
}

export const DEFAULT_WHEEL_OPTIONS: WheelNavigatorOptions = {
    threshold: 100,
    cooldownMs: 300,
    quietMs: 500,
    hintMs: 3000,
};

type Timer = ReturnType<typeof setTimeout>;

/**
 * Turns a stream of wheel deltas into page turns. One gesture fires at most one turn:
 * after navigating, further turns are locked for `cooldownMs`, and the accumulated delta
 * is dropped once no wheel event has arrived for `quietMs`.
 */
export class WheelNavigator {
    private accumulated = 0;
    private locked = false;
    private quietTimer?: Timer;
    private unlockTimer?: Timer;
    private hintTimer?: Timer;
    private readonly options: WheelNavigatorOptions;

    constructor(
        private readonly navigate: (direction: PageDirection) => void,
        options: Partial<WheelNavigatorOptions> = {},
        private readonly onHintChange?: (visible: boolean) => void,
    ) {
        this.options = { ...DEFAULT_WHEEL_OPTIONS, ...options };
    }

    public get pendingDelta(): number {
        return this.accumulated;
    }

    public get isLocked(): boolean {
        return this.locked;
    }

    public handleWheel(deltaY: number): void {
        this.accumulated += deltaY;
        this.clearQuietTimer();

        if (Math.abs(this.accumulated) > this.options.threshold && !this.locked) {
            const direction: PageDirection = this.accumulated > 0 ? 'next' : 'previous';
            this.accumulated = 0;
            this.lock();
            this.unlockAfter(this.options.cooldownMs);
            this.navigate(direction);
        }

        this.quietTimer = setTimeout(() => {
            this.accumulated = 0;
            this.quietTimer = undefined;
        }, this.options.quietMs);
    }

    /** Blocks wheel navigation until `unlockAfter` runs, e.g. for the length of a drag. */
    public lock(): void {
        this.locked = true;
        this.clearUnlockTimer();
    }

    public unlockAfter(delayMs: number): void {
        this.clearUnlockTimer();
        this.unlockTimer = setTimeout(() => {
            this.locked = false;
            this.unlockTimer = undefined;
        }, delayMs);
    }

    /** Shows the "scroll to navigate" hint for `hintMs`, restarting the timer if already shown. */
    public showHint(): void {
        if (!this.onHintChange) return;
        this.clearHintTimer();
        this.onHintChange(true);
        this.hintTimer = setTimeout(() => {
            this.hintTimer = undefined;
            this.onHintChange?.(false);
        }, this.options.hintMs);
    }

    public dispose(): void {
        this.clearQuietTimer();
        this.clearUnlockTimer();
        this.clearHintTimer();
    }

    private clearQuietTimer(): void {
        if (this.quietTimer !== undefined) {
            clearTimeout(this.quietTimer);
            this.quietTimer = undefined;
        }
    }

    private clearHintTimer(): void {
        if (this.hintTimer !== undefined) {
            clearTimeout(this.hintTimer);
            this.hintTimer = undefined;
        }
    }

    private clearUnlockTimer(): void {
        if (this.unlockTimer !== undefined) {
            clearTimeout(this.unlockTimer);
            this.unlockTimer = undefined;
        }
    }
}
