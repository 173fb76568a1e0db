import { CarColor, GameKey, LaneSlot, Rect } from './types';

export const GAME_WIDTH = 405;
export const GAME_HEIGHT = 720;

export const CAR_WIDTH = Math.floor(GAME_WIDTH / 10); // 40
export const CAR_HEIGHT = Math.floor(GAME_HEIGHT / 11); // 65
export const CAR_Y = GAME_HEIGHT - 100;
export const OBSTACLE_SIZE = Math.floor(GAME_WIDTH / 10);

export const LANE_WIDTH = Math.floor(GAME_WIDTH / 4); // 101

// Left edge of a car-sized sprite centred in lane `index` (0..3, left to right)
const laneX = (index: number) => index * LANE_WIDTH + Math.floor(LANE_WIDTH / 2) - Math.floor(CAR_WIDTH / 2);

export const LANE_1 = laneX(0); // 30
export const LANE_2 = laneX(1); // 131
export const LANE_3 = laneX(2); // 232
export const LANE_4 = laneX(3); // 333

export const CAR_LANES: Record<CarColor, Record<LaneSlot, number>> = {
  blue: { OUTER: LANE_1, INNER: LANE_2 },
  red: { INNER: LANE_3, OUTER: LANE_4 }
};

export const REST_LANE: LaneSlot = 'OUTER';

// Spawn slots as drawn from the lane permutation: 0,1 feed the red side, 2,3 the blue side.
export const SPAWN_SLOTS: ReadonlyArray<{ color: CarColor; x: number }> = [
  { color: 'red', x: LANE_3 },
  { color: 'red', x: LANE_4 },
  { color: 'blue', x: LANE_1 },
  { color: 'blue', x: LANE_2 }
];

export const MIN_SPAWN_GAP = CAR_HEIGHT + 10; // 75
export const SPAWN_Y = -OBSTACLE_SIZE;

export const INITIAL_SPAWN_RATE = 80; // ticks between spawn pairs
export const INITIAL_OBSTACLE_SPEED = 6; // px per tick
export const SPAWN_RATE_STEP = 20;
export const OBSTACLE_SPEED_STEP = 2;
export const MAX_OBSTACLE_SPEED = 15;
export const DIFFICULTY_COOLDOWN_MS = 1000;

export interface DifficultySchedule {
  intervalSeconds: number;
  minSpawnRate: number;
}

export const DIFFICULTY_SCHEDULES = {
  classic: { intervalSeconds: 15, minSpawnRate: 10 },
  revised: { intervalSeconds: 30, minSpawnRate: 20 }
} satisfies Record<string, DifficultySchedule>;

export const CAR_ANIMATION_MS = 200;
export const CAR_MAX_TILT_DEG = 15;

export const TARGET_FPS = 60;
export const FRAME_BUDGET_MS = Math.floor(1000 / TARGET_FPS); // 16

export const MENU_TEXT_SPEED = 1;
export const MENU_TEXT_RANGE = 10;

export const RESTART_BUTTON: Rect = {
  x: Math.floor(GAME_WIDTH / 2) - 50,
  y: GAME_HEIGHT / 2 - 20,
  width: 100,
  height: 40
};

export const HOME_BUTTON: Rect = {
  x: Math.floor(GAME_WIDTH / 2) - 50,
  y: GAME_HEIGHT / 2 + 30,
  width: 100,
  height: 40
};

export const KEY_BINDINGS: Record<string, GameKey> = {
  a: 'MOVE_LEFT_CAR',
  d: 'MOVE_RIGHT_CAR',
  escape: 'CANCEL',
  r: 'RESTART',
  h: 'HOME'
};

export const HIGHSCORE_XOR_KEY = 0xa5a5a5a5;
export const STORAGE_HIGHSCORE_KEY = 'twin_lanes_highscore';
export const STORAGE_SFX_KEY = 'twin_lanes_sfx';
export const STORAGE_MUSIC_KEY = 'twin_lanes_music';

export const COLORS = {
  background: '#25337a',
  laneLine: '#758adb',
  red: '#f0435a',
  blue: '#36c5f4',
  text: '#ffffff',
  overlay: 'rgba(0, 0, 0, 0.78)'
};
