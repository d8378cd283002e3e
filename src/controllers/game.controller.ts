import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { SuccessResponse } from '../common/interfaces/shared.interface';
import { TetrisMap } from '../common/interfaces/tetris-map.interface';
import { validateDto } from '../common/utils/validate-dto';
import { CreateGameDto } from '../dto/create-game.dto';
import { MovePieceDto } from '../dto/move-piece.dto';
import { GameService } from '../services/game.service';

function ok<T>(data: T): SuccessResponse<T> {
  return { success: true, data, timestamp: new Date().toISOString() };
}

@Controller('games')
export class GameController {
  constructor(private readonly gameService: GameService) {}

  @Post()
  createGame(@Body() body: unknown): SuccessResponse<TetrisMap> {
    const dto = validateDto(CreateGameDto, body);
    const game = this.gameService.createGame(dto);
    this.gameService.startGameTimer(game.id);
    return ok(this.gameService.getSnapshot(game.id));
  }

  @Get()
  listGames(): SuccessResponse<TetrisMap[]> {
    return ok(this.gameService.listGames());
  }

  @Get(':id')
  getGame(@Param('id') id: string): SuccessResponse<TetrisMap> {
    return ok(this.gameService.getSnapshot(id));
  }

  @Post(':id/move')
  @HttpCode(HttpStatus.OK)
  movePiece(
    @Param('id') id: string,
    @Body() body: unknown,
  ): SuccessResponse<TetrisMap> {
    const dto = validateDto(MovePieceDto, body);
    return ok(this.gameService.movePiece(id, dto.direction));
  }

  @Delete(':id')
  endGame(@Param('id') id: string): SuccessResponse<{ gameId: string }> {
    this.gameService.endGame(id);
    return ok({ gameId: id });
  }
}
