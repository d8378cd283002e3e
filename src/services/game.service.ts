import {
  Inject,
  Injectable,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { GAME_CONFIG, GameConfig } from '../common/config/game.config';
import { GameNotFoundException } from '../common/exceptions/game.exception';
import { MoveDirection } from '../common/interfaces/shared.interface';
import {
  TetrisGame,
  TetrisMap,
} from '../common/interfaces/tetris-map.interface';
import { LoggerService } from '../common/services/logger.service';
import { StepSchedulerService } from '../common/services/step-scheduler.service';
import { TetrisCoreService } from '../common/services/tetris-core.service';
import { CreateGameDto } from '../dto/create-game.dto';
import { TetrisMapService } from './tetris-map.service';

export type GameUpdateListener = (snapshot: TetrisMap) => void;

const MAX_IDLE_SWEEP_INTERVAL_MS = 60000;

@Injectable()
export class GameService implements OnModuleInit, OnModuleDestroy {
  private readonly games = new Map<string, TetrisGame>();
  private readonly gameTimers = new Map<string, NodeJS.Timeout>();
  private idleSweepTimer: NodeJS.Timeout | null = null;

  constructor(
    @Inject(GAME_CONFIG) private readonly config: GameConfig,
    private readonly tetrisCore: TetrisCoreService,
    private readonly scheduler: StepSchedulerService,
    private readonly tetrisMapService: TetrisMapService,
    private readonly logger: LoggerService,
  ) {}

  onModuleInit(): void {
    this.idleSweepTimer = setInterval(
      () => this.sweepIdleGames(),
      Math.min(this.config.idleTimeoutMs, MAX_IDLE_SWEEP_INTERVAL_MS),
    );
  }

  createGame(createGameDto: CreateGameDto = {}): TetrisGame {
    const intervalMs = this.scheduler.intervalFromUpdatesPerSecond(
      this.config.updatesPerSecond,
    );

    const game = this.tetrisCore.createGame({
      id: uuidv4(),
      intervalMs,
      seed: createGameDto.seed,
      sequence: createGameDto.sequence,
    });
    this.games.set(game.id, game);

    this.logger.logGameCreated(game.id, intervalMs);
    return game;
  }

  getGame(gameId: string): TetrisGame {
    const game = this.games.get(gameId);
    if (!game) {
      throw new GameNotFoundException(gameId);
    }
    return game;
  }

  hasGame(gameId: string): boolean {
    return this.games.has(gameId);
  }

  listGames(): TetrisMap[] {
    return Array.from(this.games.values()).map((game) =>
      this.tetrisMapService.toSnapshot(game),
    );
  }

  getSnapshot(gameId: string): TetrisMap {
    return this.tetrisMapService.toSnapshot(this.getGame(gameId));
  }

  movePiece(gameId: string, direction: MoveDirection): TetrisMap {
    const game = this.getGame(gameId);
    this.tetrisCore.move(game, direction);
    return this.tetrisMapService.toSnapshot(game);
  }

  // 게임 타이머 시작: 폴링 주기마다 화면 갱신, 중력 틱은 시계가 판단
  startGameTimer(gameId: string, listener?: GameUpdateListener): void {
    const game = this.getGame(gameId);
    // 기존 타이머가 있으면 제거
    this.stopGameTimer(gameId);

    const timer = setInterval(() => {
      try {
        const { gravity } = this.tetrisCore.poll(game, Date.now());
        if (gravity && listener) {
          listener(this.tetrisMapService.toSnapshot(game));
        }
      } catch (error) {
        this.logger.logError(error, { gameId });
        this.stopGameTimer(gameId);
      }
    }, this.config.pollIntervalMs);

    this.gameTimers.set(gameId, timer);
  }

  stopGameTimer(gameId: string): void {
    const timer = this.gameTimers.get(gameId);
    if (timer) {
      clearInterval(timer);
      this.gameTimers.delete(gameId);
    }
  }

  isRunning(gameId: string): boolean {
    return this.gameTimers.has(gameId);
  }

  endGame(gameId: string, reason = 'REQUESTED'): void {
    this.getGame(gameId);
    this.stopGameTimer(gameId);
    this.games.delete(gameId);
    this.logger.logGameEnded(gameId, { reason });
  }

  // 마지막 입력 이후 idleTimeoutMs가 지난 게임 종료
  sweepIdleGames(now = Date.now()): string[] {
    const expired = Array.from(this.games.values())
      .filter(
        (game) =>
          now - game.lastActivity.getTime() >= this.config.idleTimeoutMs,
      )
      .map((game) => game.id);

    expired.forEach((gameId) => this.endGame(gameId, 'IDLE'));
    return expired;
  }

  // 애플리케이션 종료 시 모든 타이머 정리
  onModuleDestroy(): void {
    if (this.idleSweepTimer) {
      clearInterval(this.idleSweepTimer);
      this.idleSweepTimer = null;
    }
    Array.from(this.gameTimers.keys()).forEach((gameId) =>
      this.stopGameTimer(gameId),
    );
    this.games.clear();
    this.logger.log('GameService 정리 완료');
  }
}
