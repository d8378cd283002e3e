import { Injectable } from '@nestjs/common';
import {
  ActivePiece,
  TetrisBlock,
  TetrisBoard,
} from '../interfaces/tetris-map.interface';
import { BoardService } from './board.service';
import { PieceService } from './piece.service';

@Injectable()
export class LockMergeService {
  constructor(
    private readonly boardService: BoardService,
    private readonly pieceService: PieceService,
  ) {}

  // 보드에 병합할 블록 목록만 계산 (변경 없음)
  collectLockBlocks(piece: ActivePiece): TetrisBlock[] {
    return this.pieceService
      .activeBlocks(piece)
      .filter((block) => block.rendered)
      .map((block) => ({
        ...block,
        position: { ...block.position },
        offset: { ...block.offset },
        active: false,
      }));
  }

  // 피스를 보드에 고정. 같은 피스로 다시 호출해도 점유 칸이 늘지 않는다
  merge(piece: ActivePiece, board: TetrisBoard): TetrisBlock[] {
    const blocks = this.collectLockBlocks(piece);
    for (const block of blocks) {
      this.boardService.place(board, block);
    }
    piece.active = false;
    return blocks;
  }
}
