import { Injectable, Logger } from '@nestjs/common';
import { LogContext } from '../interfaces/log-context.interface';
import { Position, TetrominoType } from '../interfaces/shared.interface';

@Injectable()
export class LoggerService {
  private readonly logger = new Logger(LoggerService.name);

  log(message: string, context?: LogContext) {
    this.logger.log(this.formatMessage(message, context));
  }

  error(message: string, trace?: string, context?: LogContext) {
    this.logger.error(this.formatMessage(message, context), trace);
  }

  warn(message: string, context?: LogContext) {
    this.logger.warn(this.formatMessage(message, context));
  }

  debug(message: string, context?: LogContext) {
    this.logger.debug(this.formatMessage(message, context));
  }

  verbose(message: string, context?: LogContext) {
    this.logger.verbose(this.formatMessage(message, context));
  }

  // 게임 관련 로그 메서드들
  logGameCreated(gameId: string, intervalMs: number, context?: LogContext) {
    this.log(`Game created: ${gameId} (gravity interval: ${intervalMs}ms)`, {
      ...context,
      gameId,
      action: 'GAME_CREATED',
    });
  }

  logGameEnded(gameId: string, context?: LogContext) {
    this.log(`Game ended: ${gameId}`, {
      ...context,
      gameId,
      action: 'GAME_ENDED',
    });
  }

  logPieceSpawned(
    gameId: string,
    type: TetrominoType,
    position: Position,
    context?: LogContext,
  ) {
    this.debug(`Piece spawned: ${type} at (${position.x}, ${position.y})`, {
      ...context,
      gameId,
      action: 'PIECE_SPAWNED',
    });
  }

  logPieceLocked(
    gameId: string,
    type: TetrominoType,
    blocks: Position[],
    context?: LogContext,
  ) {
    const cells = blocks.map((p) => `(${p.x},${p.y})`).join(' ');
    this.debug(`Piece locked: ${type} ${cells}`, {
      ...context,
      gameId,
      action: 'PIECE_LOCKED',
    });
  }

  logRowsCleared(gameId: string, rows: number[], context?: LogContext) {
    this.log(`Rows cleared: ${rows.join(', ')}`, {
      ...context,
      gameId,
      action: 'ROWS_CLEARED',
    });
  }

  /**
   * 조각 이동 디버깅 로그
   */
  logPieceMovement(gameId: string, direction: string, moved: boolean) {
    this.logger.verbose(
      `[PIECE_MOVEMENT] ${gameId} - ${direction} ${moved ? 'applied' : 'blocked'}`,
    );
  }

  logWebSocketConnection(clientId: string, context?: LogContext) {
    this.log(`WebSocket connected: ${clientId}`, {
      ...context,
      action: 'WS_CONNECTED',
    });
  }

  logWebSocketDisconnection(clientId: string, context?: LogContext) {
    this.log(`WebSocket disconnected: ${clientId}`, {
      ...context,
      action: 'WS_DISCONNECTED',
    });
  }

  // 입력 검증 실패 로그
  logInvalidInput(
    clientId: string,
    action: string,
    reason: string,
    context?: LogContext,
  ) {
    this.warn(
      `Invalid input detected: ${clientId} attempted ${action} - ${reason}`,
      {
        ...context,
        clientId,
        action,
        reason,
      },
    );
  }

  // 보드 범위 위반은 복구 불가한 내부 오류
  logBoardViolation(
    position: Position,
    trace?: string,
    context?: LogContext,
  ) {
    this.error(
      `Board invariant violated at (${position.x}, ${position.y})`,
      trace,
      { ...context, action: 'BOARD_OUT_OF_BOUNDS' },
    );
  }

  logError(error: unknown, context?: LogContext) {
    if (error instanceof Error) {
      this.error(`Error occurred: ${error.message}`, error.stack, context);
      return;
    }
    this.error(`Error occurred: ${String(error)}`, undefined, context);
  }

  private formatMessage(message: string, context?: LogContext): string {
    if (!context) return message;

    const contextStr = Object.entries(context)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(' ');

    return contextStr ? `${message} | ${contextStr}` : message;
  }
}
