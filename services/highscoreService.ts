import { HIGHSCORE_XOR_KEY, STORAGE_HIGHSCORE_KEY } from '../constants';
import { HighscoreStore } from '../types';

const RECORD_BYTES = 4;

export type HighscoreStorage = Pick<Storage, 'getItem' | 'setItem'>;

/** Four-byte little-endian record, XOR-ed with a fixed key, as base64. */
export const encodeHighscore = (value: number): string => {
    const bytes = new Uint8Array(RECORD_BYTES);
    new DataView(bytes.buffer).setUint32(0, (value ^ HIGHSCORE_XOR_KEY) >>> 0, true);
    return btoa(String.fromCharCode(...bytes));
};

/** Returns null for anything that is not a valid, non-negative record. */
export const decodeHighscore = (record: string): number | null => {
    let raw: string;
    try {
        raw = atob(record);
    } catch {
        return null;
    }
    if (raw.length !== RECORD_BYTES) return null;

    const bytes = Uint8Array.from(raw, char => char.charCodeAt(0));
    const value = new DataView(bytes.buffer).getUint32(0, true) ^ HIGHSCORE_XOR_KEY;
    return value < 0 ? null : value;
};

export const createHighscoreStore = (
    getStorage: () => HighscoreStorage = () => window.localStorage,
    key: string = STORAGE_HIGHSCORE_KEY
): HighscoreStore => ({
    load: () => {
        let record: string | null;
        try {
            record = getStorage().getItem(key);
        } catch (error) {
            console.warn('Error reading highscore:', error);
            return 0;
        }
        if (record === null) return 0;

        const value = decodeHighscore(record);
        if (value === null) {
            console.warn(`Ignoring unreadable highscore record "${record}".`);
            return 0;
        }
        return value;
    },

    save: (value: number) => {
        try {
            getStorage().setItem(key, encodeHighscore(value));
        } catch (error) {
            console.error('Error saving highscore:', error);
        }
    }
});

export const highscoreService = createHighscoreStore();
