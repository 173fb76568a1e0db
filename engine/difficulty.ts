import {
    DIFFICULTY_COOLDOWN_MS,
    DIFFICULTY_SCHEDULES,
    DifficultySchedule,
    INITIAL_OBSTACLE_SPEED,
    INITIAL_SPAWN_RATE,
    MAX_OBSTACLE_SPEED,
    OBSTACLE_SPEED_STEP,
    SPAWN_RATE_STEP
} from '../constants';

/**
 * Steps spawn cadence and obstacle speed each time the whole seconds since
 * `reset` reach a positive multiple of the schedule interval.
 */
export class DifficultyController {
    spawnRate = INITIAL_SPAWN_RATE;
    obstacleSpeed = INITIAL_OBSTACLE_SPEED;

    private startedAt = 0;
    private lastAdjustAt = 0;

    constructor(private readonly schedule: DifficultySchedule = DIFFICULTY_SCHEDULES.classic) {}

    reset(now: number): void {
        this.spawnRate = INITIAL_SPAWN_RATE;
        this.obstacleSpeed = INITIAL_OBSTACLE_SPEED;
        this.startedAt = now;
        this.lastAdjustAt = now;
    }

    elapsedSeconds(now: number): number {
        return Math.floor((now - this.startedAt) / 1000);
    }

    /** Returns true when this call stepped the difficulty. */
    tick(now: number): boolean {
        const seconds = this.elapsedSeconds(now);
        if (seconds <= 0 || seconds % this.schedule.intervalSeconds !== 0) return false;
        // A whole second matches on every tick inside it
        if (now - this.lastAdjustAt < DIFFICULTY_COOLDOWN_MS) return false;

        this.spawnRate = Math.max(this.schedule.minSpawnRate, this.spawnRate - SPAWN_RATE_STEP);
        this.obstacleSpeed = Math.min(MAX_OBSTACLE_SPEED, this.obstacleSpeed + OBSTACLE_SPEED_STEP);
        this.lastAdjustAt = now;
        return true;
    }
}
