import React, { useState, useEffect, useCallback } from 'react';
import { Music, Settings, Volume2 } from 'lucide-react';
import { GameCanvas } from './components/GameCanvas';
import { Button } from './components/Button';
import { STORAGE_MUSIC_KEY, STORAGE_SFX_KEY } from './constants';
import { GameOverStats, GameScreen } from './types';

const HIGHSCORE_TOAST_MS = 4000;

const readToggle = (key: string) => localStorage.getItem(key) !== 'false';

const App = () => {
  const [screen, setScreen] = useState<GameScreen>('MAIN_MENU');
  const [lastResult, setLastResult] = useState<GameOverStats | null>(null);
  const [showHighscoreToast, setShowHighscoreToast] = useState(false);
  const [showSettings, setShowSettings] = useState(false);
  const [fatalError, setFatalError] = useState<string | null>(null);

  // Settings State
  const [isSfxEnabled, setIsSfxEnabled] = useState(() => readToggle(STORAGE_SFX_KEY));
  const [isMusicEnabled, setIsMusicEnabled] = useState(() => readToggle(STORAGE_MUSIC_KEY));

  useEffect(() => {
    if (showHighscoreToast) {
      const timer = setTimeout(() => setShowHighscoreToast(false), HIGHSCORE_TOAST_MS);
      return () => clearTimeout(timer);
    }
  }, [showHighscoreToast]);

  const handleGameOver = useCallback((stats: GameOverStats) => {
    setLastResult(stats);
    if (stats.isNewHighscore) {
      setShowHighscoreToast(true);
    }
  }, []);

  const handleScreenChange = useCallback((next: GameScreen) => {
    setScreen(next);
    if (next === 'PLAYING') {
      setShowHighscoreToast(false);
    }
  }, []);

  const toggleSfx = () => {
    setIsSfxEnabled(prev => {
      const newValue = !prev;
      localStorage.setItem(STORAGE_SFX_KEY, String(newValue));
      return newValue;
    });
  };

  const toggleMusic = () => {
    setIsMusicEnabled(prev => {
      const newValue = !prev;
      localStorage.setItem(STORAGE_MUSIC_KEY, String(newValue));
      return newValue;
    });
  };

  if (fatalError) {
    return (
      <div className="h-[100dvh] bg-lane-navy text-white font-sans flex flex-col items-center justify-center p-8 text-center">
        <h1 className="text-3xl font-bold font-pixel mb-4 text-lane-red">UNABLE TO START</h1>
        <p role="alert" className="text-gray-300 mb-8">{fatalError}</p>
        <Button onClick={() => window.location.reload()} tone="red">
          RELOAD
        </Button>
      </div>
    );
  }

  return (
    <div className="h-[100dvh] bg-lane-navy text-white font-sans flex flex-col items-center justify-center overflow-hidden">

      {/* Header */}
      <header className="w-full max-w-md flex justify-between items-center px-4 py-2">
        <h1 className="text-2xl font-bold font-pixel tracking-wider">
          <span className="text-lane-blue">TWIN</span> <span className="text-lane-red">LANES</span>
        </h1>
        <button
          onClick={() => setShowSettings(true)}
          className="flex items-center gap-1 text-xs text-gray-300 hover:text-white uppercase tracking-wider"
        >
          <Settings className="w-4 h-4" />
          Settings
        </button>
      </header>

      {/* Game */}
      <div className="relative w-full flex-1 min-h-0 flex justify-center">
        <GameCanvas
          isSfxEnabled={isSfxEnabled}
          isMusicEnabled={isMusicEnabled}
          onGameOver={handleGameOver}
          onScreenChange={handleScreenChange}
          onFatalError={setFatalError}
        />

        {showHighscoreToast && lastResult && (
          <div
            role="status"
            className="absolute top-16 left-1/2 -translate-x-1/2 bg-lane-red text-white px-6 py-3 font-bold tracking-wider shadow-2xl animate-fadeIn"
          >
            NEW HIGHSCORE: {lastResult.score}
          </div>
        )}
      </div>

      {/* Controls Hint */}
      <p className="text-xs text-gray-400 py-2" data-testid="controls-hint">
        {screen === 'PLAYING'
          ? 'A: blue car · D: red car · Esc: menu'
          : screen === 'GAME_OVER'
            ? 'R: restart · H: home'
            : 'Catch your circles, dodge your boxes'}
      </p>

      {/* Settings Modal */}
      {showSettings && (
        <div className="absolute inset-0 bg-black/80 backdrop-blur-sm z-50 flex items-center justify-center p-4 animate-fadeIn">
          <div className="bg-gray-900 border border-white/20 p-8 rounded-lg max-w-sm w-full shadow-2xl">
            <h2 className="text-2xl font-pixel text-white mb-6 text-center">SETTINGS</h2>
            <div className="space-y-6">
              {/* Sound Toggles */}
              <div className="flex justify-between items-center">
                <span className="flex items-center gap-2 text-gray-300"><Volume2 className="w-4 h-4" />SFX</span>
                <button
                  onClick={toggleSfx}
                  aria-label="Toggle SFX"
                  aria-pressed={isSfxEnabled}
                  className={`w-12 h-6 rounded-full p-1 transition-colors ${isSfxEnabled ? 'bg-lane-red' : 'bg-gray-600'}`}
                >
                  <div className={`w-4 h-4 bg-white rounded-full transition-transform ${isSfxEnabled ? 'translate-x-6' : 'translate-x-0'}`} />
                </button>
              </div>
              <div className="flex justify-between items-center">
                <span className="flex items-center gap-2 text-gray-300"><Music className="w-4 h-4" />Music</span>
                <button
                  onClick={toggleMusic}
                  aria-label="Toggle music"
                  aria-pressed={isMusicEnabled}
                  className={`w-12 h-6 rounded-full p-1 transition-colors ${isMusicEnabled ? 'bg-lane-red' : 'bg-gray-600'}`}
                >
                  <div className={`w-4 h-4 bg-white rounded-full transition-transform ${isMusicEnabled ? 'translate-x-6' : 'translate-x-0'}`} />
                </button>
              </div>
              <Button onClick={() => setShowSettings(false)} fullWidth className="mt-8">
                CLOSE
              </Button>
            </div>
          </div>
        </div>
      )}
    </div>
  );
};

export default App;
