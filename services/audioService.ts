import { SoundEffect, SoundPlayer } from '../types';

export interface AudioSettings {
    sfx: boolean;
    music: boolean;
}

export interface AudioService extends SoundPlayer {
    unlock: () => void;
    setSfxEnabled: (enabled: boolean) => void;
    setMusicEnabled: (enabled: boolean) => void;
    updateMusic: (active: boolean) => void;
    dispose: () => void;
}

// Simple arcade arpeggio, 0 = rest
const MELODY = [220, 0, 220, 0, 220, 261, 329, 261, 196, 0, 196, 0, 261, 293, 261, 196];
const TEMPO = 0.15;
const MUSIC_VOLUME = 0.025;

const EFFECT_DURATION: Record<SoundEffect, number> = { pickup: 0.2, death: 0.4, miss: 0.5 };

export const createAudioService = (initial: AudioSettings): AudioService => {
    const settings = { ...initial };
    let ctx: AudioContext | null = null;
    let unavailable = false;

    let musicOsc: OscillatorNode | null = null;
    let musicGain: GainNode | null = null;
    let nextNoteTime = 0;
    let noteIndex = 0;

    const resume = (context: AudioContext) => {
        if (context.state !== 'suspended') return;
        context.resume().catch(error => console.warn('Error resuming audio:', error));
    };

    const unlock = () => {
        if (ctx) {
            resume(ctx);
            return;
        }
        if (unavailable || (!settings.sfx && !settings.music)) return;

        try {
            ctx = new AudioContext();
        } catch (error) {
            unavailable = true;
            console.error('Error creating AudioContext:', error);
        }
    };

    const applySettings = () => {
        if (!ctx) return;
        if (settings.sfx || settings.music) {
            resume(ctx);
        } else {
            ctx.suspend().catch(error => console.warn('Error suspending audio:', error));
        }
    };

    const play = (effect: SoundEffect) => {
        if (!settings.sfx || !ctx) return;
        resume(ctx);

        const osc = ctx.createOscillator();
        const gain = ctx.createGain();
        const t = ctx.currentTime;
        osc.connect(gain);
        gain.connect(ctx.destination);

        const duration = EFFECT_DURATION[effect];
        switch (effect) {
            case 'pickup':
                osc.type = 'sine';
                osc.frequency.setValueAtTime(500, t);
                osc.frequency.linearRampToValueAtTime(1000, t + duration);
                gain.gain.setValueAtTime(0.05, t);
                gain.gain.linearRampToValueAtTime(0, t + duration);
                break;
            case 'death':
                osc.type = 'sawtooth';
                osc.frequency.setValueAtTime(100, t);
                osc.frequency.exponentialRampToValueAtTime(20, t + duration);
                gain.gain.setValueAtTime(0.2, t);
                gain.gain.linearRampToValueAtTime(0, t + duration);
                break;
            case 'miss':
                osc.type = 'triangle';
                osc.frequency.setValueAtTime(150, t);
                osc.frequency.linearRampToValueAtTime(100, t + duration);
                gain.gain.setValueAtTime(0.2, t);
                gain.gain.linearRampToValueAtTime(0, t + duration);
                break;
        }
        osc.start(t);
        osc.stop(t + duration);
    };

    /** Steps the arpeggio; call once per frame. Fades out while inactive. */
    const updateMusic = (active: boolean) => {
        if (!ctx) return;
        const t = ctx.currentTime;

        if (!settings.music || !active) {
            musicGain?.gain.setTargetAtTime(0, t, 0.5);
            // Resume on the beat instead of replaying the missed ones
            nextNoteTime = t;
            return;
        }

        if (!musicOsc || !musicGain) {
            musicOsc = ctx.createOscillator();
            musicGain = ctx.createGain();
            musicOsc.type = 'square';
            musicOsc.connect(musicGain);
            musicGain.connect(ctx.destination);
            musicGain.gain.value = 0;
            musicOsc.start();
            nextNoteTime = t;
        }

        if (t >= nextNoteTime) {
            const freq = MELODY[noteIndex];
            if (freq > 0) {
                musicOsc.frequency.setValueAtTime(freq, t);
                musicGain.gain.setTargetAtTime(MUSIC_VOLUME, t, 0.02);
            } else {
                musicGain.gain.setTargetAtTime(0, t, 0.02);
            }
            nextNoteTime = Math.max(nextNoteTime + TEMPO, t);
            noteIndex = (noteIndex + 1) % MELODY.length;
        }
    };

    const dispose = () => {
        musicOsc?.stop();
        musicOsc = null;
        musicGain = null;
        if (ctx) {
            ctx.close().catch(error => console.warn('Error closing audio:', error));
            ctx = null;
        }
    };

    return {
        play,
        unlock,
        updateMusic,
        dispose,
        setSfxEnabled: enabled => {
            settings.sfx = enabled;
            applySettings();
        },
        setMusicEnabled: enabled => {
            settings.music = enabled;
            applySettings();
        }
    };
};
