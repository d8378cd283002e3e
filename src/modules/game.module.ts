import { Module } from '@nestjs/common';
import { GameController } from '../controllers/game.controller';
import { GameGateway } from '../gateways/game.gateway';
import { GameService } from '../services/game.service';
import { TetrisMapService } from '../services/tetris-map.service';
import { GAME_CONFIG, loadGameConfig } from '../common/config/game.config';
import { BoardService } from '../common/services/board.service';
import { CollisionService } from '../common/services/collision.service';
import { LockMergeService } from '../common/services/lock-merge.service';
import { LoggerService } from '../common/services/logger.service';
import { PieceGeneratorService } from '../common/services/piece-generator.service';
import { PieceService } from '../common/services/piece.service';
import { ShapeCatalogService } from '../common/services/shape-catalog.service';
import { StepSchedulerService } from '../common/services/step-scheduler.service';
import { TetrisCoreService } from '../common/services/tetris-core.service';

@Module({
  controllers: [GameController],
  providers: [
    {
      provide: GAME_CONFIG,
      useFactory: () => loadGameConfig(process.env),
    },
    GameGateway,
    GameService,
    TetrisMapService,
    ShapeCatalogService,
    BoardService,
    PieceService,
    CollisionService,
    LockMergeService,
    StepSchedulerService,
    PieceGeneratorService,
    TetrisCoreService,
    LoggerService,
  ],
  exports: [GAME_CONFIG, GameService, TetrisCoreService, LoggerService],
})
export class GameModule {}
