import { Injectable } from '@nestjs/common';
import { MoveDirection } from '../interfaces/shared.interface';
import {
  ActivePiece,
  TetrisBoard,
} from '../interfaces/tetris-map.interface';
import { BoardService } from './board.service';
import { PieceService } from './piece.service';

/**
 * 이동 가능 여부만 판단하는 순수 쿼리. 피스와 보드를 변경하지 않는다.
 * 보드 밖은 벽으로 취급한다.
 */
@Injectable()
export class CollisionService {
  constructor(
    private readonly boardService: BoardService,
    private readonly pieceService: PieceService,
  ) {}

  canFall(piece: ActivePiece, board: TetrisBoard): boolean {
    for (const block of this.pieceService.activeBlocks(piece)) {
      const below = { x: block.position.x, y: block.position.y + 1 };

      // 마지막 행을 넘어가면 바닥
      if (below.y >= board.rows) return false;
      if (!this.boardService.isInBounds(board, below)) return false;
      if (this.boardService.isOccupied(board, below)) return false;
    }
    return true;
  }

  canMove(
    piece: ActivePiece,
    board: TetrisBoard,
    direction: MoveDirection,
  ): boolean {
    const dx = direction === 'RIGHT' ? 1 : -1;

    // 앵커가 이미 벽에 붙어 있으면 바로 거부
    if (direction === 'RIGHT' && piece.position.x >= board.columns - 1) {
      return false;
    }
    if (direction === 'LEFT' && piece.position.x <= 0) {
      return false;
    }

    // 모양이 불규칙하므로 모든 활성 블록 확인
    for (const block of this.pieceService.activeBlocks(piece)) {
      const next = { x: block.position.x + dx, y: block.position.y };
      if (!this.boardService.isInBounds(board, next)) return false;
      if (this.boardService.isOccupied(board, next)) return false;
    }
    return true;
  }
}
