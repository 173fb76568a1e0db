export enum EntityKind {
  RedBox = 'RED_BOX',
  RedCircle = 'RED_CIRCLE',
  BlueBox = 'BLUE_BOX',
  BlueCircle = 'BLUE_CIRCLE'
}

export type CarColor = 'red' | 'blue';

export type ObstacleShape = 'box' | 'circle';

// Each car owns two lanes; OUTER is the one nearest the screen edge.
export type LaneSlot = 'INNER' | 'OUTER';

export type GameScreen = 'MAIN_MENU' | 'PLAYING' | 'GAME_OVER';

export type GameOverReason = 'CRASH' | 'MISSED_PICKUP';

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Entity extends Rect {
  id: number;
  kind: EntityKind;
  collected: boolean;
}

export interface Clock {
  now: () => number;
}

export type GameKey = 'MOVE_LEFT_CAR' | 'MOVE_RIGHT_CAR' | 'CANCEL' | 'RESTART' | 'HOME' | 'OTHER';

export type InputEvent =
  | { type: 'KEY'; key: GameKey }
  | { type: 'POINTER'; x: number; y: number; button: number }
  | { type: 'QUIT' };

export type SoundEffect = 'pickup' | 'death' | 'miss';

export interface SoundPlayer {
  play: (effect: SoundEffect) => void;
}

export interface HighscoreStore {
  load: () => number;
  save: (value: number) => void;
}

export interface CarSnapshot extends Rect {
  color: CarColor;
  lane: LaneSlot;
  angle: number;
}

export interface GameSnapshot {
  screen: GameScreen;
  score: number;
  highscore: number;
  spawnRate: number;
  obstacleSpeed: number;
  menuTextOffset: number;
  cars: Record<CarColor, CarSnapshot>;
  obstacles: readonly Entity[];
}

export interface GameOverStats {
  score: number;
  highscore: number;
  reason: GameOverReason;
  isNewHighscore: boolean;
}

export const kindColor = (kind: EntityKind): CarColor =>
  kind === EntityKind.RedBox || kind === EntityKind.RedCircle ? 'red' : 'blue';

export const kindShape = (kind: EntityKind): ObstacleShape =>
  kind === EntityKind.RedBox || kind === EntityKind.BlueBox ? 'box' : 'circle';

export const toEntityKind = (color: CarColor, shape: ObstacleShape): EntityKind => {
  if (color === 'red') return shape === 'box' ? EntityKind.RedBox : EntityKind.RedCircle;
  return shape === 'box' ? EntityKind.BlueBox : EntityKind.BlueCircle;
};
