import { Injectable } from '@nestjs/common';
import { PIECE_GRID_SIZE, SPAWN_POSITION } from '../constants/tetrominos';
import {
  TetrominoType,
  addPositions,
} from '../interfaces/shared.interface';
import {
  ActivePiece,
  TetrisBlock,
} from '../interfaces/tetris-map.interface';
import { ShapeCatalogService } from './shape-catalog.service';

@Injectable()
export class PieceService {
  constructor(private readonly shapeCatalog: ShapeCatalogService) {}

  // 스폰 위치(4, 0)에 새 피스 생성
  spawn(type: TetrominoType): ActivePiece {
    const blocks: TetrisBlock[][] = [];

    for (let row = 0; row < PIECE_GRID_SIZE; row++) {
      const blockRow: TetrisBlock[] = [];
      for (let col = 0; col < PIECE_GRID_SIZE; col++) {
        const filled = this.shapeCatalog.isOccupiedInShape(type, {
          x: col,
          y: row,
        });
        blockRow.push({
          type,
          position: { x: 0, y: 0 },
          offset: { x: col, y: row },
          active: filled,
          rendered: filled,
        });
      }
      blocks.push(blockRow);
    }

    const piece: ActivePiece = {
      type,
      position: { ...SPAWN_POSITION },
      blocks,
      active: true,
    };
    this.recomputePositions(piece);
    return piece;
  }

  // 앵커가 바뀐 뒤에는 충돌 검사나 렌더링 전에 반드시 호출
  recomputePositions(piece: ActivePiece): void {
    for (const row of piece.blocks) {
      for (const block of row) {
        block.position = addPositions(piece.position, block.offset);
      }
    }
  }

  // 이동 가능 여부는 검사하지 않는다 (CollisionService 먼저 확인)
  translate(piece: ActivePiece, dx: number, dy: number): void {
    piece.position = { x: piece.position.x + dx, y: piece.position.y + dy };
  }

  isLocked(piece: ActivePiece): boolean {
    return !piece.active;
  }

  activeBlocks(piece: ActivePiece): TetrisBlock[] {
    return piece.blocks.flat().filter((block) => block.active);
  }
}
