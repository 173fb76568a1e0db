import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GameLoop, frameDelay } from './gameLoop';

describe('GameLoop', () => {
    let time = 0;
    const clock = { now: () => time };

    beforeEach(() => {
        vi.useFakeTimers();
        time = 0;
    });

    afterEach(() => {
        vi.restoreAllMocks();
        vi.useRealTimers();
    });

    const scheduledDelays = (spy: { mock: { calls: unknown[][] } }) => spy.mock.calls.map(call => call[1]);

    it('sleeps for what is left of the frame budget', () => {
        const timeoutSpy = vi.spyOn(globalThis, 'setTimeout');
        const ticks: number[] = [];
        const loop = new GameLoop({
            clock,
            tick: now => {
                ticks.push(now);
                time += 5;
            }
        });

        loop.start();
        vi.runOnlyPendingTimers();
        vi.runOnlyPendingTimers();

        expect(ticks).toEqual([0, 5]);
        expect(scheduledDelays(timeoutSpy)).toEqual([0, 11, 11]);
        loop.stop();
    });

    it('does not catch up after a slow frame', () => {
        const timeoutSpy = vi.spyOn(globalThis, 'setTimeout');
        const loop = new GameLoop({
            clock,
            tick: () => {
                time += 40;
            }
        });

        loop.start();
        vi.runOnlyPendingTimers();

        expect(scheduledDelays(timeoutSpy)).toEqual([0, 0]);
        loop.stop();
    });

    it('cancels the pending frame on stop', () => {
        const tick = vi.fn();
        const loop = new GameLoop({ clock, tick });

        loop.start();
        loop.stop();
        vi.runOnlyPendingTimers();

        expect(tick).not.toHaveBeenCalled();
        expect(loop.isRunning()).toBe(false);
    });

    it('stops scheduling when the tick stops the loop', () => {
        const timeoutSpy = vi.spyOn(globalThis, 'setTimeout');
        const loop: GameLoop = new GameLoop({ clock, tick: () => loop.stop() });

        loop.start();
        vi.runOnlyPendingTimers();

        expect(timeoutSpy).toHaveBeenCalledTimes(1);
        expect(vi.getTimerCount()).toBe(0);
    });

    it('clamps the delay at zero', () => {
        expect(frameDelay(3)).toBe(13);
        expect(frameDelay(16)).toBe(0);
        expect(frameDelay(30)).toBe(0);
    });
});
