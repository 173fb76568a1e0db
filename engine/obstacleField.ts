import { GAME_HEIGHT, MIN_SPAWN_GAP, OBSTACLE_SIZE, SPAWN_SLOTS, SPAWN_Y } from '../constants';
import { CarColor, Entity, EntityKind, ObstacleShape, Rect, kindColor, kindShape, toEntityKind } from '../types';
import { intersects } from './geometry';
import { RandomSource, coinFlip, mathRandom, shuffle } from './random';

export interface CullResult {
    removed: number;
    missed: number;
}

export interface CollisionResult {
    lethal: boolean;
    collected: number;
}

const SLOT_ORDER = [0, 1, 2, 3];

export class ObstacleField {
    private entities: Entity[] = [];
    private countdown = 0;
    private nextId = 1;

    constructor(private readonly rng: RandomSource = mathRandom) {}

    get obstacles(): readonly Entity[] {
        return this.entities;
    }

    get spawnCountdown(): number {
        return this.countdown;
    }

    reset(): void {
        this.entities = [];
        this.countdown = 0;
    }

    /**
     * Emits one red-side and one blue-side entity when the countdown has run
     * out, otherwise ticks the countdown down. Returns what was spawned.
     */
    spawn(spawnRate: number): Entity[] {
        if (this.countdown > 0) {
            this.countdown--;
            return [];
        }

        const picked = new Map<CarColor, number>();
        for (const index of shuffle(SLOT_ORDER, this.rng)) {
            const slot = SPAWN_SLOTS[index];
            if (!picked.has(slot.color)) picked.set(slot.color, slot.x);
        }

        // One entity per colour, so a colour never gets two boxes in one call
        const spawned: Entity[] = [];
        for (const [color, x] of picked) {
            const shape: ObstacleShape = coinFlip(this.rng) ? 'box' : 'circle';
            const previous = this.entities[this.entities.length - 1];
            let y = SPAWN_Y;
            if (previous && previous.y - y < MIN_SPAWN_GAP) {
                y = previous.y - MIN_SPAWN_GAP;
            }
            spawned.push(this.place(toEntityKind(color, shape), x, y));
        }

        this.countdown = spawnRate;
        return spawned;
    }

    place(kind: EntityKind, x: number, y: number): Entity {
        const entity: Entity = {
            id: this.nextId++,
            kind,
            x,
            y,
            width: OBSTACLE_SIZE,
            height: OBSTACLE_SIZE,
            collected: false
        };
        this.entities.push(entity);
        return entity;
    }

    advance(speed: number): void {
        for (const entity of this.entities) {
            entity.y += speed;
        }
    }

    /** Drops everything below the screen; uncollected circles count as missed. */
    cull(): CullResult {
        let removed = 0;
        let missed = 0;
        this.entities = this.entities.filter(entity => {
            if (entity.y <= GAME_HEIGHT) return true;
            removed++;
            if (kindShape(entity.kind) === 'circle' && !entity.collected) missed++;
            return false;
        });
        return { removed, missed };
    }

    resolveCollisions(cars: Record<CarColor, Rect>): CollisionResult {
        let lethal = false;
        let collected = 0;
        for (const entity of this.entities) {
            if (!intersects(entity, cars[kindColor(entity.kind)])) continue;
            if (kindShape(entity.kind) === 'box') {
                lethal = true;
            } else if (!entity.collected) {
                entity.collected = true;
                collected++;
            }
        }
        this.entities = this.entities.filter(entity => !entity.collected);
        return { lethal, collected };
    }
}
