import { describe, it, expect } from 'vitest';
import { DifficultyController } from './difficulty';
import { DIFFICULTY_SCHEDULES } from '../constants';

const levels = (controller: DifficultyController) => [controller.spawnRate, controller.obstacleSpeed];

describe('DifficultyController', () => {
    describe('classic schedule', () => {
        it('steps every 15 seconds down to the floor', () => {
            const controller = new DifficultyController(DIFFICULTY_SCHEDULES.classic);
            controller.reset(0);

            expect(controller.tick(0)).toBe(false);
            expect(controller.tick(14999)).toBe(false);
            expect(levels(controller)).toEqual([80, 6]);

            expect(controller.tick(15000)).toBe(true);
            expect(levels(controller)).toEqual([60, 8]);
            controller.tick(30000);
            expect(levels(controller)).toEqual([40, 10]);
            controller.tick(45000);
            expect(levels(controller)).toEqual([20, 12]);
            controller.tick(60000);
            expect(levels(controller)).toEqual([10, 14]);
            controller.tick(75000);
            expect(levels(controller)).toEqual([10, 15]);
            controller.tick(90000);
            expect(levels(controller)).toEqual([10, 15]);
        });

        it('adjusts once per matching second', () => {
            const controller = new DifficultyController();
            controller.reset(0);
            expect(controller.tick(15000)).toBe(true);
            expect(controller.tick(15500)).toBe(false);
            expect(controller.tick(15999)).toBe(false);
            expect(levels(controller)).toEqual([60, 8]);
        });

        it('ignores seconds that are not multiples of the interval', () => {
            const controller = new DifficultyController();
            controller.reset(0);
            expect(controller.tick(16000)).toBe(false);
            expect(controller.tick(29999)).toBe(false);
        });
    });

    describe('revised schedule', () => {
        it('steps every 30 seconds down to a floor of 20', () => {
            const controller = new DifficultyController(DIFFICULTY_SCHEDULES.revised);
            controller.reset(0);

            expect(controller.tick(15000)).toBe(false);
            controller.tick(30000);
            expect(levels(controller)).toEqual([60, 8]);
            controller.tick(60000);
            expect(levels(controller)).toEqual([40, 10]);
            controller.tick(90000);
            expect(levels(controller)).toEqual([20, 12]);
            controller.tick(120000);
            expect(levels(controller)).toEqual([20, 14]);
            controller.tick(150000);
            expect(levels(controller)).toEqual([20, 15]);
        });
    });

    it('restarts from the initial levels on reset', () => {
        const controller = new DifficultyController();
        controller.reset(0);
        controller.tick(15000);
        controller.reset(100000);

        expect(levels(controller)).toEqual([80, 6]);
        expect(controller.tick(100000)).toBe(false);
        expect(controller.tick(115000)).toBe(true);
        expect(levels(controller)).toEqual([60, 8]);
    });

    it('stays monotonic and bounded across a long session', () => {
        for (const schedule of Object.values(DIFFICULTY_SCHEDULES)) {
            const controller = new DifficultyController(schedule);
            controller.reset(0);
            let [rate, speed] = levels(controller);

            for (let now = 0; now <= 300000; now += 16) {
                controller.tick(now);
                expect(controller.spawnRate).toBeLessThanOrEqual(rate);
                expect(controller.obstacleSpeed).toBeGreaterThanOrEqual(speed);
                expect(controller.spawnRate).toBeGreaterThanOrEqual(schedule.minSpawnRate);
                expect(controller.obstacleSpeed).toBeLessThanOrEqual(15);
                [rate, speed] = levels(controller);
            }
            expect(controller.spawnRate).toBe(schedule.minSpawnRate);
            expect(controller.obstacleSpeed).toBe(15);
        }
    });
});
