import {
  WebSocketGateway,
  WebSocketServer,
  SubscribeMessage,
  OnGatewayConnection,
  OnGatewayDisconnect,
  ConnectedSocket,
  MessageBody,
  WsException,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { BaseGameException } from '../common/exceptions/base.exception';
import { GameNotOwnedException } from '../common/exceptions/game.exception';
import { TetrisMap } from '../common/interfaces/tetris-map.interface';
import { LoggerService } from '../common/services/logger.service';
import { validateDto } from '../common/utils/validate-dto';
import { CreateGameDto } from '../dto/create-game.dto';
import { MovePieceDto } from '../dto/move-piece.dto';
import { GameService } from '../services/game.service';

interface MovePieceMessage {
  gameId?: unknown;
  direction?: unknown;
}

@WebSocketGateway({
  cors: {
    origin: '*',
  },
})
export class GameGateway implements OnGatewayConnection, OnGatewayDisconnect {
  @WebSocketServer()
  server!: Server;

  // 클라이언트별 소유 게임
  private readonly clientGames = new Map<string, Set<string>>();

  constructor(
    private readonly gameService: GameService,
    private readonly logger: LoggerService,
  ) {}

  handleConnection(client: Socket) {
    this.logger.logWebSocketConnection(client.id, {
      ip: client.handshake.address,
      userAgent: client.handshake.headers['user-agent'],
    });
  }

  handleDisconnect(client: Socket) {
    this.logger.logWebSocketDisconnection(client.id, {
      ip: client.handshake.address,
    });

    // 연결이 끊기면 소유한 게임 모두 종료
    const games = this.clientGames.get(client.id);
    if (games) {
      games.forEach((gameId) => {
        if (this.gameService.hasGame(gameId)) {
          this.gameService.endGame(gameId);
        }
      });
      this.clientGames.delete(client.id);
    }
  }

  @SubscribeMessage('startGame')
  handleStartGame(
    @ConnectedSocket() client: Socket,
    @MessageBody() data: unknown,
  ): { success: true; snapshot: TetrisMap } {
    try {
      const dto = validateDto(CreateGameDto, data ?? {});
      const game = this.gameService.createGame(dto);

      const owned = this.clientGames.get(client.id) ?? new Set<string>();
      owned.add(game.id);
      this.clientGames.set(client.id, owned);

      this.gameService.startGameTimer(game.id, (snapshot) => {
        client.emit('gameStateUpdate', snapshot);
      });

      const snapshot = this.gameService.getSnapshot(game.id);
      client.emit('startGameResponse', { success: true, snapshot });
      return { success: true, snapshot };
    } catch (error) {
      throw this.toWsException(error, 'START_GAME_ERROR');
    }
  }

  @SubscribeMessage('movePiece')
  handleMovePiece(
    @ConnectedSocket() client: Socket,
    @MessageBody() data: MovePieceMessage | undefined,
  ): TetrisMap {
    const rawGameId = data?.gameId;
    const gameId = typeof rawGameId === 'string' ? rawGameId : '';
    try {
      const owned = this.clientGames.get(client.id);
      if (!owned || !owned.has(gameId)) {
        throw new GameNotOwnedException(gameId, client.id);
      }

      const dto = validateDto(MovePieceDto, { direction: data?.direction });
      const snapshot = this.gameService.movePiece(gameId, dto.direction);
      client.emit('gameStateUpdate', snapshot);
      return snapshot;
    } catch (error) {
      if (error instanceof BaseGameException) {
        this.logger.logInvalidInput(client.id, 'movePiece', error.message, {
          gameId,
        });
      }
      throw this.toWsException(error, 'MOVE_PIECE_ERROR');
    }
  }

  private toWsException(error: unknown, fallbackCode: string): WsException {
    if (error instanceof BaseGameException) {
      return new WsException({
        success: false,
        error: { code: error.code, message: error.message },
      });
    }

    this.logger.logError(error);
    return new WsException({
      success: false,
      error: {
        code: fallbackCode,
        message: error instanceof Error ? error.message : String(error),
      },
    });
  }
}
