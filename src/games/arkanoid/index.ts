import type { GameAPI, GameInstance, GameFactory } from '../../core/types';
import { ArkanoidGame } from './ArkanoidGame';

const factory: GameFactory = (container: HTMLElement, api: GameAPI): GameInstance => {
  return new ArkanoidGame(container, api);
};

export default factory;
