import type { GameAPI, GameInstance, GameOutcome } from '../../core/types';
import { createLogger } from '../../core/logger';
import { fontFamilyOf, loadFont, type FontAsset } from './assets';
import { KeyboardInput } from './input';
import { FrameLimiter } from './pacing';
import { CanvasRenderer } from './renderer';
import { createSession, restart, stepFrame, type FrameReport, type GameSession } from './state';
import { FRAME_RATE, GameStatus, SCREEN_HEIGHT, SCREEN_WIDTH } from './types';

const log = createLogger('arkanoid-game');

const FONT_FAMILY = 'Arcade Sans';
const FONT_SOURCE = 'local("Liberation Sans"), local("Arial")';
const FINISH_DELAY_MS = 500;

export class ArkanoidGame implements GameInstance {
  private api: GameAPI;
  private container: HTMLElement;
  private canvas: HTMLCanvasElement;
  private renderer: CanvasRenderer;
  private input: KeyboardInput;
  private limiter = new FrameLimiter(FRAME_RATE);
  private session: GameSession = createSession();
  private font: FontAsset | null = null;
  private reportedLives: number | null = null;

  private isPaused: boolean = false;
  private isDestroyed: boolean = false;
  private animationFrameId: number = 0;
  private finishTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(container: HTMLElement, api: GameAPI) {
    this.container = container;
    this.api = api;

    this.canvas = document.createElement('canvas');
    this.canvas.style.width = '100%';
    this.canvas.style.height = '100%';
    this.canvas.style.display = 'block';
    container.appendChild(this.canvas);

    const ctx = this.canvas.getContext('2d');
    if (!ctx) throw new Error('Failed to get 2D context');
    this.renderer = new CanvasRenderer(ctx, SCREEN_WIDTH, SCREEN_HEIGHT);
    this.input = new KeyboardInput(window);

    this.resize();
    window.addEventListener('resize', this.resize);
  }

  start(): void {
    restart(this.session);
    this.reportLives(this.session.remainingLives);

    loadFont(FONT_FAMILY, FONT_SOURCE)
      .then((font) => {
        this.font = font;
      })
      .catch((err: unknown) => {
        log.error('Font loader rejected', err);
      });

    this.startGameLoop();
  }

  pause(): void {
    this.isPaused = true;
    this.stopGameLoop();
    this.input.release();
  }

  resume(): void {
    if (this.isDestroyed) return;
    this.isPaused = false;
    this.startGameLoop();
  }

  destroy(): void {
    this.isDestroyed = true;
    this.stopGameLoop();
    this.clearFinishTimer();
    this.input.dispose();
    window.removeEventListener('resize', this.resize);
    this.canvas.remove();
  }

  private resize = () => {
    const rect = this.container.getBoundingClientRect();
    const dpr = window.devicePixelRatio || 1;
    this.renderer.resize(rect.width, rect.height, dpr);
  };

  private startGameLoop() {
    if (this.animationFrameId || this.isPaused || this.isDestroyed) return;
    this.limiter.reset();
    this.animationFrameId = requestAnimationFrame(this.gameLoop);
  }

  private stopGameLoop() {
    if (!this.animationFrameId) return;
    cancelAnimationFrame(this.animationFrameId);
    this.animationFrameId = 0;
  }

  private gameLoop = (time: number) => {
    this.animationFrameId = 0;
    if (this.isDestroyed || this.isPaused) return;

    if (this.limiter.tick(time)) {
      const settings = this.api.getSettings();
      const report = stepFrame(this.session, this.input, this.renderer, {
        fontFamily: fontFamilyOf(this.font),
        showHitCounts: settings.showHitCounts,
      });

      if (report.quit) {
        log.info('Quit requested');
        this.api.quit();
        return;
      }
      this.handleReport(report);
    }

    this.animationFrameId = requestAnimationFrame(this.gameLoop);
  };

  private handleReport(report: FrameReport) {
    this.reportLives(report.remainingLives);
    if (report.livesLost > 0 || report.bricksDestroyed > 0) {
      this.api.haptics.tap();
    }

    if (report.status === report.previousStatus) {
      return;
    }
    if (report.status === GameStatus.Victory) {
      this.api.haptics.success();
      this.scheduleFinish('victory');
    } else if (report.status === GameStatus.GameOver) {
      this.scheduleFinish('defeat');
    } else {
      // Restarted or unpaused before a pending finish fired
      this.clearFinishTimer();
    }
  }

  private reportLives(lives: number) {
    if (lives === this.reportedLives) return;
    this.reportedLives = lives;
    this.api.setLives(lives);
  }

  // Let the final frame stay on screen before the host covers it
  private scheduleFinish(outcome: GameOutcome) {
    this.clearFinishTimer();
    this.finishTimer = setTimeout(() => {
      this.finishTimer = null;
      if (!this.isDestroyed) {
        this.api.finish(outcome);
      }
    }, FINISH_DELAY_MS);
  }

  private clearFinishTimer() {
    if (this.finishTimer === null) return;
    clearTimeout(this.finishTimer);
    this.finishTimer = null;
  }
}
