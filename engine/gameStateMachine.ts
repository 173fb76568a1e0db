import { DEFAULT_CONFIG, DifficultyScheduleName, InputPollMode } from '../config';
import { DIFFICULTY_SCHEDULES, HOME_BUTTON, RESTART_BUTTON } from '../constants';
import {
    CarColor,
    Clock,
    GameKey,
    GameOverReason,
    GameOverStats,
    GameScreen,
    GameSnapshot,
    HighscoreStore,
    InputEvent,
    SoundPlayer
} from '../types';
import { Car } from './car';
import { DifficultyController } from './difficulty';
import { containsPoint } from './geometry';
import { InputQueue } from './inputQueue';
import { MenuTextBob } from './menuAnimation';
import { ObstacleField } from './obstacleField';
import { RandomSource, mathRandom } from './random';

export interface GameStateMachineOptions {
    highscoreStore: HighscoreStore;
    sound?: SoundPlayer;
    clock?: Clock;
    rng?: RandomSource;
    difficultySchedule?: DifficultyScheduleName;
    inputPollMode?: InputPollMode;
    debug?: boolean;
    onGameOver?: (stats: GameOverStats) => void;
    onScreenChange?: (screen: GameScreen) => void;
}

const LEFT_BUTTON = 0;

const silent: SoundPlayer = { play: () => {} };

const performanceClock: Clock = { now: () => performance.now() };

export class GameStateMachine {
    readonly field: ObstacleField;
    readonly cars: Record<CarColor, Car> = { red: new Car('red'), blue: new Car('blue') };

    private screen: GameScreen = 'MAIN_MENU';
    private score = 0;
    private highscore: number;
    private running = true;

    private readonly difficulty: DifficultyController;
    private readonly menuText = new MenuTextBob();
    private readonly store: HighscoreStore;
    private readonly sound: SoundPlayer;
    private readonly clock: Clock;
    private readonly pollMode: InputPollMode;
    private readonly debug: boolean;
    private readonly onGameOver?: (stats: GameOverStats) => void;
    private readonly onScreenChange?: (screen: GameScreen) => void;

    constructor(options: GameStateMachineOptions) {
        this.store = options.highscoreStore;
        this.sound = options.sound ?? silent;
        this.clock = options.clock ?? performanceClock;
        this.pollMode = options.inputPollMode ?? DEFAULT_CONFIG.inputPollMode;
        this.debug = options.debug ?? DEFAULT_CONFIG.debug;
        this.onGameOver = options.onGameOver;
        this.onScreenChange = options.onScreenChange;
        this.field = new ObstacleField(options.rng ?? mathRandom);
        this.difficulty = new DifficultyController(
            DIFFICULTY_SCHEDULES[options.difficultySchedule ?? DEFAULT_CONFIG.difficultySchedule]
        );
        this.highscore = this.store.load();
    }

    getScreen(): GameScreen {
        return this.screen;
    }

    getScore(): number {
        return this.score;
    }

    getHighscore(): number {
        return this.highscore;
    }

    isRunning(): boolean {
        return this.running;
    }

    /** Takes one queued event per tick, or all of them in `drain` mode. */
    handleInput(queue: InputQueue): void {
        if (this.pollMode === 'drain') {
            for (const event of queue.drain()) this.dispatch(event);
            return;
        }
        const event = queue.poll();
        if (event) this.dispatch(event);
    }

    dispatch(event: InputEvent): void {
        if (!this.running) return;
        if (event.type === 'QUIT') {
            this.shutdown();
            return;
        }

        switch (this.screen) {
            case 'MAIN_MENU':
                if (event.type === 'KEY' || event.button === LEFT_BUTTON) this.startPlaying();
                break;
            case 'PLAYING':
                if (event.type === 'KEY') this.handlePlayingKey(event.key);
                break;
            case 'GAME_OVER':
                if (event.type === 'KEY') {
                    if (event.key === 'RESTART') this.startPlaying();
                    else if (event.key === 'HOME') this.returnToMenu();
                } else if (event.button === LEFT_BUTTON) {
                    if (containsPoint(RESTART_BUTTON, event.x, event.y)) this.startPlaying();
                    else if (containsPoint(HOME_BUTTON, event.x, event.y)) this.returnToMenu();
                }
                break;
        }
    }

    private handlePlayingKey(key: GameKey): void {
        const now = this.clock.now();
        switch (key) {
            case 'MOVE_LEFT_CAR':
                this.cars.blue.toggleLane(now);
                break;
            case 'MOVE_RIGHT_CAR':
                this.cars.red.toggleLane(now);
                break;
            case 'CANCEL':
                this.returnToMenu();
                break;
            default:
                break;
        }
    }

    update(now: number = this.clock.now()): void {
        if (!this.running) return;
        if (this.screen === 'MAIN_MENU') {
            this.menuText.step();
        } else if (this.screen === 'PLAYING') {
            this.updatePlaying(now);
        }
    }

    private updatePlaying(now: number): void {
        this.field.advance(this.difficulty.obstacleSpeed);
        const { missed } = this.field.cull();
        const { lethal, collected } = this.field.resolveCollisions({
            red: this.cars.red.rect,
            blue: this.cars.blue.rect
        });

        if (collected > 0) {
            this.score += collected;
            this.sound.play('pickup');
        }

        if (lethal || missed > 0) {
            this.enterGameOver(lethal ? 'CRASH' : 'MISSED_PICKUP');
            return;
        }

        if (this.difficulty.tick(now)) {
            this.log(`difficulty: spawnRate=${this.difficulty.spawnRate} speed=${this.difficulty.obstacleSpeed}`);
        }
        this.field.spawn(this.difficulty.spawnRate);
        this.cars.red.update(now);
        this.cars.blue.update(now);
    }

    private startPlaying(): void {
        this.resetSession();
        this.setScreen('PLAYING');
    }

    private returnToMenu(): void {
        this.resetSession();
        this.menuText.reset();
        this.setScreen('MAIN_MENU');
    }

    private enterGameOver(reason: GameOverReason): void {
        this.sound.play(reason === 'CRASH' ? 'death' : 'miss');

        const isNewHighscore = this.score > this.highscore;
        if (isNewHighscore) {
            this.highscore = this.score;
            this.store.save(this.highscore);
        }

        this.setScreen('GAME_OVER');
        this.onGameOver?.({ score: this.score, highscore: this.highscore, reason, isNewHighscore });
    }

    private resetSession(): void {
        this.score = 0;
        this.field.reset();
        this.difficulty.reset(this.clock.now());
        this.cars.red.reset();
        this.cars.blue.reset();
    }

    private setScreen(screen: GameScreen): void {
        this.log(`${this.screen} -> ${screen}`);
        this.screen = screen;
        this.onScreenChange?.(screen);
    }

    private log(message: string): void {
        if (this.debug) console.log(`[Game] ${message}`);
    }

    snapshot(): GameSnapshot {
        return {
            screen: this.screen,
            score: this.score,
            highscore: this.highscore,
            spawnRate: this.difficulty.spawnRate,
            obstacleSpeed: this.difficulty.obstacleSpeed,
            menuTextOffset: this.menuText.offset,
            cars: { red: this.cars.red.snapshot(), blue: this.cars.blue.snapshot() },
            obstacles: this.field.obstacles.map(entity => ({ ...entity }))
        };
    }

    saveHighscore(): void {
        this.store.save(this.highscore);
    }

    /** Persists the high score and stops accepting input and updates. */
    shutdown(): void {
        if (!this.running) return;
        this.running = false;
        this.saveHighscore();
        this.log('shutdown');
    }
}
