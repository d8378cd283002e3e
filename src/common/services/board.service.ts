import { Injectable } from '@nestjs/common';
import { BOARD_COLUMNS, BOARD_ROWS } from '../constants/tetrominos';
import { BoardOutOfBoundsException } from '../exceptions/base.exception';
import { Position } from '../interfaces/shared.interface';
import {
  BoardCell,
  TetrisBlock,
  TetrisBoard,
} from '../interfaces/tetris-map.interface';

@Injectable()
export class BoardService {
  createBoard(columns = BOARD_COLUMNS, rows = BOARD_ROWS): TetrisBoard {
    const cells: BoardCell[][] = [];
    for (let y = 0; y < rows; y++) {
      cells.push(this.createEmptyRow(columns, y));
    }
    return { columns, rows, cells };
  }

  isInBounds(board: TetrisBoard, position: Position): boolean {
    return (
      position.x >= 0 &&
      position.x < board.columns &&
      position.y >= 0 &&
      position.y < board.rows
    );
  }

  getCell(board: TetrisBoard, position: Position): BoardCell {
    this.assertInBounds(board, position);
    return board.cells[position.y][position.x];
  }

  isOccupied(board: TetrisBoard, position: Position): boolean {
    return this.getCell(board, position).occupied;
  }

  // 고정된 블록 복사본을 저장. 같은 칸에 두 번 놓아도 점유 칸 수는 그대로
  place(board: TetrisBoard, block: TetrisBlock): BoardCell {
    const cell = this.getCell(board, block.position);
    cell.block = {
      ...block,
      position: { ...block.position },
      offset: { ...block.offset },
      active: false,
      rendered: true,
    };
    cell.occupied = true;
    return cell;
  }

  occupiedCount(board: TetrisBoard): number {
    let count = 0;
    for (const row of board.cells) {
      for (const cell of row) {
        if (cell.occupied) count++;
      }
    }
    return count;
  }

  findFullRows(board: TetrisBoard): number[] {
    const rows: number[] = [];
    board.cells.forEach((row, y) => {
      if (row.every((cell) => cell.occupied)) rows.push(y);
    });
    return rows;
  }

  // 꽉 찬 줄을 제거하고 위쪽 줄들을 아래로 내림
  clearFullRows(board: TetrisBoard): number[] {
    const fullRows = this.findFullRows(board);
    if (fullRows.length === 0) return fullRows;

    const remaining = board.cells.filter((_, y) => !fullRows.includes(y));
    while (remaining.length < board.rows) {
      remaining.unshift(this.createEmptyRow(board.columns, 0));
    }

    // 행이 이동했으므로 좌표 다시 기록
    remaining.forEach((row, y) => {
      row.forEach((cell, x) => {
        cell.position = { x, y };
        if (cell.block) {
          cell.block.position = { x, y };
        }
      });
    });
    board.cells = remaining;

    return fullRows;
  }

  private createEmptyRow(columns: number, y: number): BoardCell[] {
    const row: BoardCell[] = [];
    for (let x = 0; x < columns; x++) {
      row.push({ position: { x, y }, occupied: false, block: null });
    }
    return row;
  }

  private assertInBounds(board: TetrisBoard, position: Position): void {
    if (!this.isInBounds(board, position)) {
      throw new BoardOutOfBoundsException(position, board.columns, board.rows);
    }
  }
}
