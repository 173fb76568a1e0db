import { describe, it, expect } from 'vitest';
import { Car, rotationAngle, stepTowards } from './car';

describe('car animation helpers', () => {
    it('is level at both ends of the rotation', () => {
        expect(rotationAngle(0, 200)).toBe(0);
        expect(rotationAngle(200, 200)).toBe(0);
        expect(rotationAngle(250, 200)).toBe(0);
    });

    it('peaks halfway through the rotation', () => {
        expect(rotationAngle(100, 200)).toBeCloseTo(15);
    });

    it('lands exactly on the target when the move is over', () => {
        expect(stepTowards(80.5, 131, 200, 200)).toBe(131);
    });

    it('covers the given fraction of the remaining distance', () => {
        expect(stepTowards(30, 131, 100, 200)).toBe(80.5);
    });
});

describe('Car', () => {
    it('starts on its outer lane', () => {
        const blue = new Car('blue');
        const red = new Car('red');
        expect(blue.x).toBe(30);
        expect(blue.lane).toBe('OUTER');
        expect(red.x).toBe(333);
        expect(red.rect).toEqual({ x: 333, y: 620, width: 40, height: 65 });
    });

    it('eases toward the other lane and settles', () => {
        const car = new Car('blue');
        car.toggleLane(0);
        expect(car.lane).toBe('INNER');
        expect(car.moveAnim).toEqual({ startTime: 0, targetX: 131, duration: 200 });

        car.update(100);
        expect(car.x).toBe(80.5);
        expect(car.angle).toBeCloseTo(15);

        car.update(200);
        expect(car.x).toBe(131);
        expect(car.angle).toBe(0);
        expect(car.moveAnim).toBeNull();
        expect(car.rotateAnim).toBeNull();
    });

    it('returns to its first lane after two toggles', () => {
        const car = new Car('blue');
        car.toggleLane(0);
        car.update(200);
        car.toggleLane(200);
        car.update(300);
        expect(car.x).toBe(80.5);
        car.update(400);
        expect(car.x).toBe(30);
        expect(car.lane).toBe('OUTER');
    });

    it('restarts the animation when toggled mid-move', () => {
        const car = new Car('red');
        car.toggleLane(0);
        car.update(100);
        expect(car.x).toBe(282.5);

        car.toggleLane(100);
        expect(car.moveAnim).toEqual({ startTime: 100, targetX: 333, duration: 200 });
        car.update(300);
        expect(car.x).toBe(333);
    });

    it('resets to rest without animations', () => {
        const car = new Car('red');
        car.toggleLane(0);
        car.update(50);
        car.reset();
        expect(car.snapshot()).toEqual({ x: 333, y: 620, width: 40, height: 65, color: 'red', lane: 'OUTER', angle: 0 });
        expect(car.moveAnim).toBeNull();
        expect(car.rotateAnim).toBeNull();
    });
});
