import React, { useEffect, useRef } from 'react';
import { GameConfig, gameConfig } from '../config';
import { GAME_HEIGHT, GAME_WIDTH } from '../constants';
import { GameLoop } from '../engine/gameLoop';
import { GameStateMachine } from '../engine/gameStateMachine';
import { InputQueue } from '../engine/inputQueue';
import { AudioService, createAudioService } from '../services/audioService';
import { highscoreService } from '../services/highscoreService';
import { GameOverStats, GameScreen, HighscoreStore } from '../types';
import { drawScene } from './drawScene';

export const MISSING_CONTEXT_MESSAGE = 'Canvas 2D context is not available.';

interface GameCanvasProps {
    isSfxEnabled: boolean;
    isMusicEnabled: boolean;
    onGameOver?: (stats: GameOverStats) => void;
    onScreenChange?: (screen: GameScreen) => void;
    onFatalError?: (message: string) => void;
    highscoreStore?: HighscoreStore;
    config?: GameConfig;
}

export const GameCanvas: React.FC<GameCanvasProps> = ({
    isSfxEnabled,
    isMusicEnabled,
    onGameOver,
    onScreenChange,
    onFatalError,
    highscoreStore = highscoreService,
    config = gameConfig
}) => {
    const canvasRef = useRef<HTMLCanvasElement>(null);
    const audioRef = useRef<AudioService | null>(null);

    // Read by the running game, so prop changes don't restart it
    const settingsRef = useRef({ sfx: isSfxEnabled, music: isMusicEnabled });
    const callbacksRef = useRef({ onGameOver, onScreenChange, onFatalError });
    callbacksRef.current = { onGameOver, onScreenChange, onFatalError };

    useEffect(() => {
        settingsRef.current.sfx = isSfxEnabled;
        audioRef.current?.setSfxEnabled(isSfxEnabled);
    }, [isSfxEnabled]);

    useEffect(() => {
        settingsRef.current.music = isMusicEnabled;
        audioRef.current?.setMusicEnabled(isMusicEnabled);
    }, [isMusicEnabled]);

    useEffect(() => {
        const canvas = canvasRef.current;
        if (!canvas) return;
        const ctx = canvas.getContext('2d');
        if (!ctx) {
            console.error(MISSING_CONTEXT_MESSAGE);
            callbacksRef.current.onFatalError?.(MISSING_CONTEXT_MESSAGE);
            return;
        }

        const audio = createAudioService(settingsRef.current);
        audioRef.current = audio;

        const queue = new InputQueue();
        const machine = new GameStateMachine({
            highscoreStore,
            sound: audio,
            difficultySchedule: config.difficultySchedule,
            inputPollMode: config.inputPollMode,
            debug: config.debug,
            onGameOver: stats => callbacksRef.current.onGameOver?.(stats),
            onScreenChange: screen => callbacksRef.current.onScreenChange?.(screen)
        });

        const loop: GameLoop = new GameLoop({
            tick: now => {
                machine.handleInput(queue);
                machine.update(now);
                drawScene(ctx, machine.snapshot());
                audio.updateMusic(machine.getScreen() !== 'GAME_OVER');
                if (!machine.isRunning()) loop.stop();
            }
        });

        // ----------------------------------------
        // Input Handling
        // ----------------------------------------
        const handleKeyDown = (e: KeyboardEvent) => {
            audio.unlock();
            if (e.repeat) return;
            queue.pushKey(e.key);
        };

        const handleMouseDown = (e: MouseEvent) => {
            audio.unlock();
            // The canvas is scaled by CSS; map back to game coordinates
            const bounds = canvas.getBoundingClientRect();
            const scaleX = bounds.width > 0 ? GAME_WIDTH / bounds.width : 1;
            const scaleY = bounds.height > 0 ? GAME_HEIGHT / bounds.height : 1;
            queue.push({
                type: 'POINTER',
                x: (e.clientX - bounds.left) * scaleX,
                y: (e.clientY - bounds.top) * scaleY,
                button: e.button
            });
        };

        // The page may come back from the back/forward cache, so keep the game alive
        const handlePageHide = () => {
            machine.saveHighscore();
        };

        window.addEventListener('keydown', handleKeyDown);
        window.addEventListener('pagehide', handlePageHide);
        canvas.addEventListener('mousedown', handleMouseDown);

        drawScene(ctx, machine.snapshot());
        loop.start();

        return () => {
            loop.stop();
            window.removeEventListener('keydown', handleKeyDown);
            window.removeEventListener('pagehide', handlePageHide);
            canvas.removeEventListener('mousedown', handleMouseDown);

            machine.dispatch({ type: 'QUIT' });
            audio.dispose();
            audioRef.current = null;
        };
    }, [highscoreStore, config]);

    return (
        <canvas
            ref={canvasRef}
            width={GAME_WIDTH}
            height={GAME_HEIGHT}
            data-testid="game-canvas"
            className="w-full h-full max-w-md shadow-2xl bg-black touch-none"
        />
    );
};
