import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_CONFIG, resolveGameConfig } from './config';

describe('resolveGameConfig', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('uses the defaults for an empty environment', () => {
        expect(resolveGameConfig({})).toEqual(DEFAULT_CONFIG);
        expect(DEFAULT_CONFIG).toEqual({ difficultySchedule: 'classic', inputPollMode: 'single', debug: false });
    });

    it('reads every setting', () => {
        expect(
            resolveGameConfig({
                VITE_DIFFICULTY_SCHEDULE: 'revised',
                VITE_INPUT_POLL: 'drain',
                VITE_DEBUG_MODE: 'true'
            })
        ).toEqual({ difficultySchedule: 'revised', inputPollMode: 'drain', debug: true });
    });

    it('ignores case and surrounding spaces', () => {
        const config = resolveGameConfig({ VITE_DIFFICULTY_SCHEDULE: ' Revised ', VITE_INPUT_POLL: 'DRAIN' });
        expect(config.difficultySchedule).toBe('revised');
        expect(config.inputPollMode).toBe('drain');
    });

    it('falls back with a warning on unknown values', () => {
        const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const config = resolveGameConfig({ VITE_DIFFICULTY_SCHEDULE: 'brutal', VITE_INPUT_POLL: 'all' });

        expect(config).toEqual(DEFAULT_CONFIG);
        expect(warnSpy).toHaveBeenCalledWith('Unknown VITE_DIFFICULTY_SCHEDULE "brutal", using "classic".');
        expect(warnSpy).toHaveBeenCalledWith('Unknown VITE_INPUT_POLL "all", using "single".');
    });

    it('only enables debug for the exact string true', () => {
        expect(resolveGameConfig({ VITE_DEBUG_MODE: '1' }).debug).toBe(false);
    });
});
