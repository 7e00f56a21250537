import { useNavigate } from 'react-router-dom';
import type { GameMetadata } from '../../core/types';

interface GameCardProps {
  game: GameMetadata;
}

export function GameCard({ game }: GameCardProps) {
  const navigate = useNavigate();

  const handlePlay = () => {
    if (!game.disabled) {
      navigate(`/game/${game.id}`);
    }
  };

  return (
    <div
      onClick={handlePlay}
      className={`relative bg-gray-700/50 rounded-2xl p-4 transition-all flex flex-col ${
        game.disabled
          ? 'opacity-50 cursor-not-allowed'
          : 'hover:bg-gray-700 active:scale-98 cursor-pointer'
      }`}
    >
      <div className="flex items-start gap-3">
        <div className="text-3xl">{game.icon}</div>
        <div className="flex-1 min-w-0">
          <h3 className="font-semibold text-base leading-tight">{game.name}</h3>
          {!game.disabled && (
            <div className="text-xs text-gray-400 mt-0.5">Keyboard · 3 lives</div>
          )}
        </div>
      </div>

      {/* Disabled badge */}
      {game.disabled && (
        <div className="absolute inset-0 flex items-center justify-center rounded-2xl bg-gray-800/50">
          <span className="text-sm text-gray-500">Coming Soon</span>
        </div>
      )}
    </div>
  );
}
