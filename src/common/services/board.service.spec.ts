import { BoardOutOfBoundsException } from '../exceptions/base.exception';
import { blockAt } from '../testing/core-test.helper';
import { BoardService } from './board.service';

describe('BoardService', () => {
  const boardService = new BoardService();

  describe('createBoard', () => {
    it('creates an empty 10x20 board', () => {
      const board = boardService.createBoard();

      expect(board.columns).toBe(10);
      expect(board.rows).toBe(20);
      expect(board.cells).toHaveLength(20);
      expect(board.cells[0]).toHaveLength(10);
      expect(boardService.occupiedCount(board)).toBe(0);
      expect(board.cells[7][3]).toEqual({
        position: { x: 3, y: 7 },
        occupied: false,
        block: null,
      });
    });
  });

  describe('isOccupied', () => {
    it.each([
      { x: -1, y: 0 },
      { x: 10, y: 0 },
      { x: 0, y: 20 },
      { x: 0, y: -1 },
    ])('rejects out-of-range position %o', (position) => {
      const board = boardService.createBoard();
      expect(() => boardService.isOccupied(board, position)).toThrow(
        BoardOutOfBoundsException,
      );
    });
  });

  describe('place', () => {
    it('stores a frozen copy of the block', () => {
      const board = boardService.createBoard();
      const block = blockAt(3, 19, 'T');

      boardService.place(board, block);
      block.position.x = 0;

      const cell = boardService.getCell(board, { x: 3, y: 19 });
      expect(cell.occupied).toBe(true);
      expect(cell.block).toEqual({
        type: 'T',
        position: { x: 3, y: 19 },
        offset: { x: 0, y: 0 },
        active: false,
        rendered: true,
      });
    });

    it('treats occupancy as a set', () => {
      const board = boardService.createBoard();

      boardService.place(board, blockAt(2, 2));
      boardService.place(board, blockAt(2, 2));

      expect(boardService.occupiedCount(board)).toBe(1);
    });

    it('rejects a block outside the board instead of clamping it', () => {
      const board = boardService.createBoard();

      expect(() => boardService.place(board, blockAt(10, 19))).toThrow(
        BoardOutOfBoundsException,
      );
      expect(boardService.occupiedCount(board)).toBe(0);
    });
  });

  describe('clearFullRows', () => {
    it('finds no full rows on an empty board', () => {
      expect(boardService.findFullRows(boardService.createBoard())).toEqual(
        [],
      );
    });

    it('removes full rows and shifts the rows above down', () => {
      const board = boardService.createBoard();
      for (let x = 0; x < 10; x++) {
        boardService.place(board, blockAt(x, 19));
      }
      boardService.place(board, blockAt(0, 18, 'I'));

      expect(boardService.clearFullRows(board)).toEqual([19]);

      const moved = boardService.getCell(board, { x: 0, y: 19 });
      expect(moved.occupied).toBe(true);
      expect(moved.position).toEqual({ x: 0, y: 19 });
      expect(moved.block?.type).toBe('I');
      expect(moved.block?.position).toEqual({ x: 0, y: 19 });
      expect(boardService.isOccupied(board, { x: 0, y: 18 })).toBe(false);
      expect(board.cells[0][0].position).toEqual({ x: 0, y: 0 });
      expect(boardService.occupiedCount(board)).toBe(1);
    });
  });
});
