import { useNavigate } from 'react-router-dom';
import type { GameOutcome } from '../../core/types';

interface GameOverOverlayProps {
  outcome: GameOutcome;
  onPlayAgain: () => void;
}

export function GameOverOverlay({ outcome, onPlayAgain }: GameOverOverlayProps) {
  const navigate = useNavigate();
  const won = outcome === 'victory';

  return (
    <div className="fixed inset-0 z-30 flex items-center justify-center bg-black/70 backdrop-blur-sm">
      <div className="bg-gray-800 rounded-2xl p-6 mx-4 max-w-sm w-full text-center animate-pop-in">
        <h2 className={`text-3xl font-extrabold mb-2 font-display ${won ? 'text-yellow-400' : ''}`}>
          {won ? 'You Won!' : 'Game Over'}
        </h2>
        <p className="text-gray-400 text-sm font-display">
          {won ? 'Every brick cleared.' : 'Out of lives.'}
        </p>

        <div className="space-y-3 mt-6">
          <button
            onClick={onPlayAgain}
            className="w-full py-3 bg-primary-500 hover:bg-primary-400 text-white font-bold font-display rounded-xl active:scale-[0.97] transition-all shadow-lg shadow-primary-500/25"
          >
            Play Again
          </button>
          <button
            onClick={() => navigate('/')}
            className="w-full py-3 bg-gray-700 hover:bg-gray-600 text-white font-medium rounded-xl active:scale-98 transition-all"
          >
            Home
          </button>
        </div>
      </div>
    </div>
  );
}
