import { HttpException, HttpStatus } from '@nestjs/common';
import { ErrorResponse, Position } from '../interfaces/shared.interface';

export abstract class BaseGameException extends HttpException {
  constructor(
    message: string,
    status: HttpStatus,
    public readonly code: string,
    public readonly details?: unknown,
  ) {
    const body: ErrorResponse = {
      code,
      message,
      details,
    };
    super(body, status);
  }
}

export class ValidationException extends BaseGameException {
  constructor(message: string, details?: unknown) {
    super(message, HttpStatus.BAD_REQUEST, 'VALIDATION_ERROR', details);
  }
}

export class TetrisLogicException extends BaseGameException {
  constructor(message: string, details?: unknown) {
    super(message, HttpStatus.BAD_REQUEST, 'TETRIS_LOGIC_ERROR', details);
  }
}

// 보드 범위 밖 접근은 호출자 버그: 복구하지 않는다
export class BoardOutOfBoundsException extends BaseGameException {
  constructor(
    public readonly position: Position,
    columns: number,
    rows: number,
  ) {
    super(
      `Position (${position.x}, ${position.y}) is outside the ${columns}x${rows} board`,
      HttpStatus.INTERNAL_SERVER_ERROR,
      'BOARD_OUT_OF_BOUNDS',
      { position, columns, rows },
    );
  }
}
