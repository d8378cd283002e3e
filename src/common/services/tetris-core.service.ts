import { Inject, Injectable } from '@nestjs/common';
import { GAME_CONFIG, GameConfig } from '../config/game.config';
import { PieceGeneratorOptions } from '../interfaces/piece-generator.interface';
import { MoveDirection } from '../interfaces/shared.interface';
import {
  ActivePiece,
  GravityOutcome,
  PollResult,
  TetrisGame,
} from '../interfaces/tetris-map.interface';
import { BoardService } from './board.service';
import { CollisionService } from './collision.service';
import { LockMergeService } from './lock-merge.service';
import { LoggerService } from './logger.service';
import { PieceGeneratorService } from './piece-generator.service';
import { PieceService } from './piece.service';
import { StepSchedulerService } from './step-scheduler.service';

export interface CreateTetrisGameOptions extends PieceGeneratorOptions {
  id: string;
  intervalMs: number;
}

/**
 * 게임 상태 컨테이너를 다루는 오케스트레이터.
 * 충돌 검사와 병합 블록 계산은 각 서비스가 하고, 보드 변경은 여기서만 일어난다.
 */
@Injectable()
export class TetrisCoreService {
  constructor(
    @Inject(GAME_CONFIG) private readonly config: GameConfig,
    private readonly boardService: BoardService,
    private readonly pieceService: PieceService,
    private readonly collisionService: CollisionService,
    private readonly lockMergeService: LockMergeService,
    private readonly scheduler: StepSchedulerService,
    private readonly generator: PieceGeneratorService,
    private readonly logger: LoggerService,
  ) {}

  createGame(options: CreateTetrisGameOptions): TetrisGame {
    const generator = this.generator.createState({
      seed: options.seed,
      sequence: options.sequence,
    });
    const now = new Date();

    const game: TetrisGame = {
      id: options.id,
      board: this.boardService.createBoard(),
      piece: this.pieceService.spawn(this.generator.next(generator)),
      clock: this.scheduler.createClock(options.intervalMs),
      generator,
      lockedPieces: 0,
      linesCleared: 0,
      createdAt: now,
      lastActivity: now,
    };

    this.logger.logPieceSpawned(game.id, game.piece.type, game.piece.position);
    return game;
  }

  // 매 폴링: 화면 갱신은 항상, 중력 틱은 시계가 허락할 때만 (이 순서로)
  poll(game: TetrisGame, now: number): PollResult {
    this.pieceService.recomputePositions(game.piece);

    const { clock, gravityDue } = this.scheduler.poll(game.clock, now);
    game.clock = clock;

    if (!gravityDue) {
      return { gravity: null };
    }
    return { gravity: this.gravityTick(game) };
  }

  gravityTick(game: TetrisGame): GravityOutcome {
    const piece = game.piece;

    if (piece.active && this.collisionService.canFall(piece, game.board)) {
      this.pieceService.translate(piece, 0, 1);
      this.pieceService.recomputePositions(piece);
      return { type: 'fell', position: { ...piece.position } };
    }

    // 더 이상 떨어질 수 없으면 고정 후 새 피스 스폰
    const lockedBlocks = this.lockMergeService.merge(piece, game.board);
    game.lockedPieces++;
    this.logger.logPieceLocked(
      game.id,
      piece.type,
      lockedBlocks.map((block) => block.position),
    );

    let clearedRows: number[] = [];
    if (this.config.clearFullRows) {
      clearedRows = this.boardService.clearFullRows(game.board);
      if (clearedRows.length > 0) {
        game.linesCleared += clearedRows.length;
        this.logger.logRowsCleared(game.id, clearedRows);
      }
    }

    const spawned = this.spawnNext(game);
    return { type: 'locked', lockedBlocks, clearedRows, spawned };
  }

  move(game: TetrisGame, direction: MoveDirection): boolean {
    const piece = game.piece;
    game.lastActivity = new Date();

    if (
      !piece.active ||
      !this.collisionService.canMove(piece, game.board, direction)
    ) {
      this.logger.logPieceMovement(game.id, direction, false);
      return false;
    }

    this.pieceService.translate(piece, direction === 'RIGHT' ? 1 : -1, 0);
    this.pieceService.recomputePositions(piece);
    this.logger.logPieceMovement(game.id, direction, true);
    return true;
  }

  private spawnNext(game: TetrisGame): ActivePiece {
    const type = this.generator.next(game.generator);
    game.piece = this.pieceService.spawn(type);
    this.logger.logPieceSpawned(game.id, type, game.piece.position);
    return game.piece;
  }
}
