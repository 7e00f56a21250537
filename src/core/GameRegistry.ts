import type { GameDefinition, GameMetadata } from './types';

export const GAMES: GameDefinition[] = [
  {
    id: 'arkanoid',
    name: 'Arkanoid',
    icon: '🧱',
    factory: () => import('../games/arkanoid'),
  },
];

export function getGameById(id: string): GameDefinition | undefined {
  return GAMES.find((g) => g.id === id);
}

export function getGameMetadata(): GameMetadata[] {
  return GAMES.map(({ id, name, icon, disabled }) => ({ id, name, icon, disabled }));
}
