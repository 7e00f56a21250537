import { useState, useCallback, useEffect } from 'react';
import { useParams, useNavigate } from 'react-router-dom';
import { getGameById } from '../../core/GameRegistry';
import { GameHost } from '../../core/GameHost';
import type { GameOutcome } from '../../core/types';
import { HUD } from '../ui/HUD';
import { OptionsModal } from '../ui/OptionsModal';
import { GameOverOverlay } from '../ui/GameOverOverlay';
import { GameInfoModal } from '../ui/GameInfoModal';

export function GameRoute() {
  const { id } = useParams<{ id: string }>();
  const navigate = useNavigate();

  const [lives, setLives] = useState(0);
  const [outcome, setOutcome] = useState<GameOutcome | null>(null);
  const [optionsOpen, setOptionsOpen] = useState(false);
  const [infoOpen, setInfoOpen] = useState(false);
  const [gameKey, setGameKey] = useState(0);

  const gameDef = id ? getGameById(id) : undefined;

  // Redirect if game not found
  useEffect(() => {
    if (!gameDef || gameDef.disabled) {
      navigate('/', { replace: true });
    }
  }, [gameDef, navigate]);

  const handleLivesChange = useCallback((newLives: number) => {
    setLives(newLives);
  }, []);

  const handleFinish = useCallback((result: GameOutcome) => {
    setOutcome(result);
  }, []);

  const handleQuit = useCallback(() => {
    navigate('/');
  }, [navigate]);

  const handlePlayAgain = useCallback(() => {
    setOutcome(null);
    setGameKey((k) => k + 1);
  }, []);

  if (!gameDef) {
    return null;
  }

  return (
    <div className="flex-1 flex flex-col overflow-hidden">
      <HUD
        gameName={gameDef.name}
        lives={lives}
        onOptionsClick={() => setOptionsOpen(true)}
        onInfoClick={() => setInfoOpen(true)}
      />

      <GameHost
        key={gameKey}
        gameId={gameDef.id}
        onLivesChange={handleLivesChange}
        onFinish={handleFinish}
        onQuit={handleQuit}
        isPaused={optionsOpen || infoOpen || outcome !== null}
      />

      {outcome && (
        <GameOverOverlay outcome={outcome} onPlayAgain={handlePlayAgain} />
      )}

      <OptionsModal isOpen={optionsOpen} onClose={() => setOptionsOpen(false)} />
      <GameInfoModal isOpen={infoOpen} onClose={() => setInfoOpen(false)} gameId={gameDef.id} />
    </div>
  );
}
