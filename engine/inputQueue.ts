import { KEY_BINDINGS } from '../constants';
import { GameKey, InputEvent } from '../types';

export const toGameKey = (key: string): GameKey => {
    const name = key.toLowerCase();
    return Object.hasOwn(KEY_BINDINGS, name) ? KEY_BINDINGS[name] : 'OTHER';
};

/** FIFO of input events collected between ticks. */
export class InputQueue {
    private events: InputEvent[] = [];

    push(event: InputEvent): void {
        this.events.push(event);
    }

    pushKey(key: string): void {
        this.push({ type: 'KEY', key: toGameKey(key) });
    }

    poll(): InputEvent | undefined {
        return this.events.shift();
    }

    drain(): InputEvent[] {
        const drained = this.events;
        this.events = [];
        return drained;
    }

    clear(): void {
        this.events = [];
    }

    get size(): number {
        return this.events.length;
    }
}
