import { Injectable } from '@nestjs/common';
import { ShapeCatalogService } from '../common/services/shape-catalog.service';
import { PieceService } from '../common/services/piece.service';
import {
  CellSnapshot,
  TetrisGame,
  TetrisMap,
} from '../common/interfaces/tetris-map.interface';

@Injectable()
export class TetrisMapService {
  constructor(
    private readonly shapeCatalog: ShapeCatalogService,
    private readonly pieceService: PieceService,
  ) {}

  // 렌더러용 읽기 전용 스냅샷 (원본 상태와 참조를 공유하지 않음)
  toSnapshot(game: TetrisGame): TetrisMap {
    const cells: CellSnapshot[][] = game.board.cells.map((row) =>
      row.map((cell) => ({
        x: cell.position.x,
        y: cell.position.y,
        occupied: cell.occupied,
        type: cell.block ? cell.block.type : null,
        colors: cell.block
          ? { ...this.shapeCatalog.colorsFor(cell.block.type) }
          : null,
      })),
    );

    const piece = game.piece;
    const blocks = this.pieceService.activeBlocks(piece).map((block) => ({
      x: block.position.x,
      y: block.position.y,
      type: block.type,
      colors: { ...this.shapeCatalog.colorsFor(block.type) },
      rendered: block.rendered,
    }));

    return {
      gameId: game.id,
      width: game.board.columns,
      height: game.board.rows,
      cells,
      currentPiece: {
        type: piece.type,
        position: { ...piece.position },
        blocks,
      },
      lockedPieces: game.lockedPieces,
      linesCleared: game.linesCleared,
      gravityTicks: game.clock.gravityTicks,
      lastUpdated: game.lastActivity.toISOString(),
    };
  }
}
