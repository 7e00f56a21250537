interface GameInfoModalProps {
  isOpen: boolean;
  onClose: () => void;
  gameId: string;
}

const GAME_RULES: Record<string, { title: string; rules: string[] }> = {
  arkanoid: {
    title: 'Arkanoid',
    rules: [
      'Press P to start, and again to pause',
      'Move the paddle with the arrow keys (or A / D)',
      'Hit the ball on the left half of the paddle to send it left, right half for right',
      'Brighter bricks take more hits - up to three',
      'Dropping the ball costs a life; you have three',
      'Break every brick to win. R restarts, Esc quits',
    ],
  },
};

export function GameInfoModal({ isOpen, onClose, gameId }: GameInfoModalProps) {
  if (!isOpen) return null;

  const info = GAME_RULES[gameId] || { title: 'Game Rules', rules: ['No rules available'] };

  return (
    <div className="fixed inset-0 z-40 flex items-center justify-center p-4">
      {/* Backdrop */}
      <div
        className="absolute inset-0 bg-black/60 backdrop-blur-sm"
        onClick={onClose}
      />

      {/* Modal */}
      <div className="relative bg-gray-800 rounded-2xl p-6 max-w-sm w-full animate-pop-in">
        <div className="flex items-center justify-between mb-4">
          <h2 className="text-xl font-bold font-display">{info.title}</h2>
          <button
            onClick={onClose}
            className="p-2 -m-2 text-gray-400 hover:text-white"
            aria-label="Close"
          >
            <svg className="w-6 h-6" fill="none" stroke="currentColor" viewBox="0 0 24 24">
              <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M6 18L18 6M6 6l12 12" />
            </svg>
          </button>
        </div>

        <div className="space-y-3">
          <h3 className="text-sm font-semibold text-gray-400 uppercase tracking-wide">How to Play</h3>
          <ul className="space-y-2">
            {info.rules.map((rule, i) => (
              <li key={i} className="flex gap-3 text-sm text-gray-200">
                <span className="text-primary-400 font-bold">{i + 1}.</span>
                <span>{rule}</span>
              </li>
            ))}
          </ul>
        </div>

        <button
          onClick={onClose}
          className="w-full mt-6 py-3 bg-primary-500 hover:bg-primary-400 text-white font-bold font-display rounded-xl transition-colors shadow-lg shadow-primary-500/25"
        >
          Got it!
        </button>
      </div>
    </div>
  );
}
