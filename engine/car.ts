import {
    CAR_ANIMATION_MS,
    CAR_HEIGHT,
    CAR_LANES,
    CAR_MAX_TILT_DEG,
    CAR_WIDTH,
    CAR_Y,
    REST_LANE
} from '../constants';
import { CarColor, CarSnapshot, LaneSlot, Rect } from '../types';

export interface MoveAnimation {
    startTime: number;
    targetX: number;
    duration: number;
}

export interface RotateAnimation {
    startTime: number;
    duration: number;
}

/** Bank angle in degrees, `elapsed` ms into a rotation of `duration` ms. */
export const rotationAngle = (elapsed: number, duration: number): number => {
    if (elapsed >= duration) return 0;
    return CAR_MAX_TILT_DEG * Math.sin((Math.PI / duration) * Math.max(0, elapsed));
};

/**
 * One tick of the lane-change ease. The fraction is applied to the distance
 * still remaining, so the car closes in fast and then settles.
 */
export const stepTowards = (current: number, target: number, elapsed: number, duration: number): number => {
    if (elapsed >= duration) return target;
    const t = Math.max(0, elapsed) / duration;
    return current + t * (target - current);
};

export class Car {
    readonly color: CarColor;
    readonly y = CAR_Y;
    readonly width = CAR_WIDTH;
    readonly height = CAR_HEIGHT;

    lane: LaneSlot = REST_LANE;
    x: number;
    angle = 0;
    moveAnim: MoveAnimation | null = null;
    rotateAnim: RotateAnimation | null = null;

    constructor(color: CarColor, private readonly animationMs: number = CAR_ANIMATION_MS) {
        this.color = color;
        this.x = CAR_LANES[color][REST_LANE];
    }

    reset(): void {
        this.lane = REST_LANE;
        this.x = CAR_LANES[this.color][REST_LANE];
        this.angle = 0;
        this.moveAnim = null;
        this.rotateAnim = null;
    }

    /** Switch to the other lane; restarts both animations even mid-move. */
    toggleLane(now: number): void {
        this.lane = this.lane === 'OUTER' ? 'INNER' : 'OUTER';
        this.moveAnim = { startTime: now, targetX: CAR_LANES[this.color][this.lane], duration: this.animationMs };
        this.rotateAnim = { startTime: now, duration: this.animationMs };
    }

    update(now: number): void {
        this.updateRotation(now);
        this.updateMovement(now);
    }

    private updateRotation(now: number): void {
        if (!this.rotateAnim) return;
        const elapsed = now - this.rotateAnim.startTime;
        this.angle = rotationAngle(elapsed, this.rotateAnim.duration);
        if (elapsed >= this.rotateAnim.duration) {
            this.rotateAnim = null;
        }
    }

    private updateMovement(now: number): void {
        if (!this.moveAnim) return;
        const { startTime, targetX, duration } = this.moveAnim;
        const elapsed = now - startTime;
        this.x = stepTowards(this.x, targetX, elapsed, duration);
        if (elapsed >= duration) {
            this.moveAnim = null;
        }
    }

    get rect(): Rect {
        return { x: this.x, y: this.y, width: this.width, height: this.height };
    }

    snapshot(): CarSnapshot {
        return { ...this.rect, color: this.color, lane: this.lane, angle: this.angle };
    }
}
