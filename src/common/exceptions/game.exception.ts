import { HttpStatus } from '@nestjs/common';
import { BaseGameException } from './base.exception';

export class GameNotFoundException extends BaseGameException {
  constructor(gameId: string) {
    super(
      `Game with ID ${gameId} not found`,
      HttpStatus.NOT_FOUND,
      'GAME_NOT_FOUND',
      { gameId },
    );
  }
}

export class GameNotOwnedException extends BaseGameException {
  constructor(gameId: string, clientId: string) {
    super(
      `Game ${gameId} does not belong to client ${clientId}`,
      HttpStatus.FORBIDDEN,
      'GAME_NOT_OWNED',
      { gameId, clientId },
    );
  }
}
