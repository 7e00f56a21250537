import { useEffect, useRef, useState } from 'react';
import { getGameById } from './GameRegistry';
import { createLogger } from './logger';
import { useSettings } from './SettingsStore';
import type { GameAPI, GameInstance, GameOutcome, Settings } from './types';

const log = createLogger('game-host');

interface GameHostProps {
  gameId: string;
  onLivesChange: (lives: number) => void;
  onFinish: (outcome: GameOutcome) => void;
  onQuit: () => void;
  isPaused: boolean;
}

export function GameHost({ gameId, onLivesChange, onFinish, onQuit, isPaused }: GameHostProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const instanceRef = useRef<GameInstance | null>(null);
  const { settings } = useSettings();
  const settingsRef = useRef<Settings>(settings);
  const [isLoading, setIsLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  // Keep settings ref updated
  useEffect(() => {
    settingsRef.current = settings;
  }, [settings]);

  // Handle pause/resume
  useEffect(() => {
    const instance = instanceRef.current;
    if (!instance) return;

    if (isPaused) {
      instance.pause();
    } else {
      instance.resume();
    }
  }, [isPaused]);

  // Initialize game
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    const gameDef = getGameById(gameId);
    if (!gameDef || gameDef.disabled) {
      setError('Game not found');
      setIsLoading(false);
      return;
    }

    let destroyed = false;

    const api: GameAPI = {
      setLives: (lives: number) => {
        if (!destroyed) {
          onLivesChange(lives);
        }
      },
      finish: (outcome: GameOutcome) => {
        if (!destroyed) {
          log.info(`Game ${gameId} finished`, { outcome });
          onFinish(outcome);
        }
      },
      quit: () => {
        if (!destroyed) {
          onQuit();
        }
      },
      getSettings: () => settingsRef.current,
      haptics: {
        tap: () => {
          if (settingsRef.current.haptics && navigator.vibrate) {
            navigator.vibrate(10);
          }
        },
        success: () => {
          if (settingsRef.current.haptics && navigator.vibrate) {
            navigator.vibrate([10, 50, 10]);
          }
        },
      },
    };

    gameDef
      .factory()
      .then((module) => {
        if (destroyed) return;
        const factory = module.default;
        const instance = factory(container, api);
        instanceRef.current = instance;
        setIsLoading(false);
        instance.start();
      })
      .catch((err: unknown) => {
        if (destroyed) return;
        log.error(`Failed to load game ${gameId}`, err);
        setError('Failed to load game');
        setIsLoading(false);
      });

    return () => {
      destroyed = true;
      if (instanceRef.current) {
        instanceRef.current.destroy();
        instanceRef.current = null;
      }
    };
  }, [gameId, onLivesChange, onFinish, onQuit]);

  return (
    <div className="flex-1 w-full h-full relative overflow-hidden">
      {/* Always render container so game can mount */}
      <div
        ref={containerRef}
        className="absolute inset-0"
        style={{ touchAction: 'none' }}
      />

      {/* Loading overlay */}
      {isLoading && (
        <div className="absolute inset-0 flex items-center justify-center bg-gray-800">
          <div className="animate-pulse text-white">Loading...</div>
        </div>
      )}

      {/* Error overlay */}
      {error && (
        <div className="absolute inset-0 flex items-center justify-center bg-gray-800">
          <p className="text-white">{error}</p>
        </div>
      )}
    </div>
  );
}
