import { describe, it, expect } from 'vitest';
import { MenuTextBob } from './menuAnimation';

describe('MenuTextBob', () => {
    it('bounces between plus and minus ten', () => {
        const bob = new MenuTextBob();
        const offsets = Array.from({ length: 31 }, () => bob.step());

        expect(offsets[9]).toBe(10);
        expect(offsets[10]).toBe(9);
        expect(offsets[29]).toBe(-10);
        expect(offsets[30]).toBe(-9);
        expect(Math.max(...offsets)).toBe(10);
        expect(Math.min(...offsets)).toBe(-10);
    });

    it('returns to the centre on reset', () => {
        const bob = new MenuTextBob();
        bob.step();
        bob.step();
        bob.reset();
        expect(bob.offset).toBe(0);
        expect(bob.step()).toBe(1);
    });
});
