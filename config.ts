import { DIFFICULTY_SCHEDULES } from './constants';

export type DifficultyScheduleName = keyof typeof DIFFICULTY_SCHEDULES;

/**
 * `single` handles one queued input per tick, like a once-per-frame poll;
 * `drain` handles every event queued since the previous tick.
 */
export type InputPollMode = 'single' | 'drain';

export interface GameConfig {
    difficultySchedule: DifficultyScheduleName;
    inputPollMode: InputPollMode;
    debug: boolean;
}

export interface GameEnv {
    VITE_DIFFICULTY_SCHEDULE?: string;
    VITE_INPUT_POLL?: string;
    VITE_DEBUG_MODE?: string;
}

export const DEFAULT_CONFIG: GameConfig = {
    difficultySchedule: 'classic',
    inputPollMode: 'single',
    debug: false
};

const isScheduleName = (value: string): value is DifficultyScheduleName =>
    Object.prototype.hasOwnProperty.call(DIFFICULTY_SCHEDULES, value);

const isPollMode = (value: string): value is InputPollMode => value === 'single' || value === 'drain';

export const resolveGameConfig = (env: GameEnv): GameConfig => {
    const config: GameConfig = { ...DEFAULT_CONFIG, debug: env.VITE_DEBUG_MODE === 'true' };

    const schedule = env.VITE_DIFFICULTY_SCHEDULE?.trim().toLowerCase();
    if (schedule) {
        if (isScheduleName(schedule)) {
            config.difficultySchedule = schedule;
        } else {
            console.warn(`Unknown VITE_DIFFICULTY_SCHEDULE "${schedule}", using "${DEFAULT_CONFIG.difficultySchedule}".`);
        }
    }

    const poll = env.VITE_INPUT_POLL?.trim().toLowerCase();
    if (poll) {
        if (isPollMode(poll)) {
            config.inputPollMode = poll;
        } else {
            console.warn(`Unknown VITE_INPUT_POLL "${poll}", using "${DEFAULT_CONFIG.inputPollMode}".`);
        }
    }

    return config;
};

export const gameConfig = resolveGameConfig(import.meta.env);
