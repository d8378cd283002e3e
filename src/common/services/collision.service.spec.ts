import { blockAt, createCoreServices } from '../testing/core-test.helper';

describe('CollisionService', () => {
  const { boardService, pieceService, collisionService } =
    createCoreServices();

  describe('canFall', () => {
    it('lets a one-row piece fall 19 times on an empty board', () => {
      const board = boardService.createBoard();
      const piece = pieceService.spawn('I');

      for (let i = 0; i < 19; i++) {
        expect(collisionService.canFall(piece, board)).toBe(true);
        pieceService.translate(piece, 0, 1);
        pieceService.recomputePositions(piece);
      }

      expect(piece.position.y).toBe(19);
      expect(collisionService.canFall(piece, board)).toBe(false);
    });

    it('stops when a cell directly below is occupied', () => {
      const board = boardService.createBoard();
      boardService.place(board, blockAt(5, 5));
      const piece = pieceService.spawn('O');

      piece.position = { x: 4, y: 2 };
      pieceService.recomputePositions(piece);
      expect(collisionService.canFall(piece, board)).toBe(true);

      piece.position = { x: 4, y: 3 };
      pieceService.recomputePositions(piece);
      expect(collisionService.canFall(piece, board)).toBe(false);
    });

    it('does not mutate the piece', () => {
      const board = boardService.createBoard();
      const piece = pieceService.spawn('T');

      collisionService.canFall(piece, board);

      expect(piece.position).toEqual({ x: 4, y: 0 });
    });
  });

  describe('canMove', () => {
    it('allows both directions in open space', () => {
      const board = boardService.createBoard();
      const piece = pieceService.spawn('O');

      expect(collisionService.canMove(piece, board, 'LEFT')).toBe(true);
      expect(collisionService.canMove(piece, board, 'RIGHT')).toBe(true);
    });

    it('rejects RIGHT for a piece against the right wall', () => {
      const board = boardService.createBoard();
      const piece = pieceService.spawn('I');
      piece.position = { x: 6, y: 0 };
      pieceService.recomputePositions(piece);

      expect(collisionService.canMove(piece, board, 'RIGHT')).toBe(false);
      expect(collisionService.canMove(piece, board, 'LEFT')).toBe(true);
    });

    it('rejects RIGHT when a locked block is in the way', () => {
      const board = boardService.createBoard();
      boardService.place(board, blockAt(6, 1));
      const piece = pieceService.spawn('O');

      expect(collisionService.canMove(piece, board, 'RIGHT')).toBe(false);
      expect(collisionService.canMove(piece, board, 'LEFT')).toBe(true);
    });

    it('rejects LEFT at column 0', () => {
      const board = boardService.createBoard();
      const piece = pieceService.spawn('J');
      piece.position = { x: 0, y: 5 };
      pieceService.recomputePositions(piece);

      expect(collisionService.canMove(piece, board, 'LEFT')).toBe(false);
    });

    it('checks every active block of an irregular piece', () => {
      // L at (4,0): (6,0) (4,1) (5,1) (6,1)
      const board = boardService.createBoard();
      const piece = pieceService.spawn('L');

      boardService.place(board, blockAt(7, 0));
      expect(collisionService.canMove(piece, board, 'RIGHT')).toBe(false);

      boardService.place(board, blockAt(3, 1));
      expect(collisionService.canMove(piece, board, 'LEFT')).toBe(false);

      // (4,0)은 L 모양의 빈 칸이라 막지 않음
      const open = boardService.createBoard();
      boardService.place(open, blockAt(4, 0));
      expect(collisionService.canMove(piece, open, 'LEFT')).toBe(true);
      expect(collisionService.canMove(piece, open, 'RIGHT')).toBe(true);
    });
  });
});
