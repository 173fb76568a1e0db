import { describe, it, expect } from 'vitest';
import { InputQueue, toGameKey } from './inputQueue';

describe('toGameKey', () => {
    it('maps the bound keys in either case', () => {
        expect(toGameKey('a')).toBe('MOVE_LEFT_CAR');
        expect(toGameKey('A')).toBe('MOVE_LEFT_CAR');
        expect(toGameKey('d')).toBe('MOVE_RIGHT_CAR');
        expect(toGameKey('Escape')).toBe('CANCEL');
        expect(toGameKey('R')).toBe('RESTART');
        expect(toGameKey('h')).toBe('HOME');
    });

    it('maps everything else to OTHER', () => {
        expect(toGameKey('x')).toBe('OTHER');
        expect(toGameKey(' ')).toBe('OTHER');
        expect(toGameKey('constructor')).toBe('OTHER');
    });
});

describe('InputQueue', () => {
    it('polls events in arrival order', () => {
        const queue = new InputQueue();
        queue.pushKey('a');
        queue.push({ type: 'POINTER', x: 10, y: 20, button: 0 });

        expect(queue.size).toBe(2);
        expect(queue.poll()).toEqual({ type: 'KEY', key: 'MOVE_LEFT_CAR' });
        expect(queue.poll()).toEqual({ type: 'POINTER', x: 10, y: 20, button: 0 });
        expect(queue.poll()).toBeUndefined();
    });

    it('drains everything at once', () => {
        const queue = new InputQueue();
        queue.pushKey('a');
        queue.pushKey('d');
        expect(queue.drain()).toEqual([
            { type: 'KEY', key: 'MOVE_LEFT_CAR' },
            { type: 'KEY', key: 'MOVE_RIGHT_CAR' }
        ]);
        expect(queue.size).toBe(0);
    });

    it('clears pending events', () => {
        const queue = new InputQueue();
        queue.push({ type: 'QUIT' });
        queue.clear();
        expect(queue.poll()).toBeUndefined();
    });
});
