import { FRAME_BUDGET_MS } from '../constants';
import { Clock } from '../types';

export interface GameLoopOptions {
    tick: (now: number) => void;
    clock?: Clock;
    frameBudgetMs?: number;
}

export const frameDelay = (elapsed: number, budget: number = FRAME_BUDGET_MS): number => Math.max(0, budget - elapsed);

/**
 * Fixed-cadence driver: each frame runs the tick, then waits out whatever is
 * left of the frame budget. A slow frame is not caught up.
 */
export class GameLoop {
    private handle: ReturnType<typeof setTimeout> | null = null;
    private running = false;

    private readonly tick: (now: number) => void;
    private readonly clock: Clock;
    private readonly frameBudgetMs: number;

    constructor(options: GameLoopOptions) {
        this.tick = options.tick;
        this.clock = options.clock ?? { now: () => performance.now() };
        this.frameBudgetMs = options.frameBudgetMs ?? FRAME_BUDGET_MS;
    }

    start(): void {
        if (this.running) return;
        this.running = true;
        this.handle = setTimeout(this.frame, 0);
    }

    stop(): void {
        this.running = false;
        if (this.handle !== null) {
            clearTimeout(this.handle);
            this.handle = null;
        }
    }

    isRunning(): boolean {
        return this.running;
    }

    private frame = (): void => {
        this.handle = null;
        if (!this.running) return;

        const start = this.clock.now();
        this.tick(start);
        // The tick may have stopped the loop
        if (!this.running) return;

        const elapsed = this.clock.now() - start;
        this.handle = setTimeout(this.frame, frameDelay(elapsed, this.frameBudgetMs));
    };
}
