import { ColorPair, Position, TetrominoType } from './shared.interface';
import { GravityClock } from './gravity-clock.interface';
import { PieceGeneratorState } from './piece-generator.interface';

export interface TetrisBlock {
  type: TetrominoType;
  position: Position; // 보드 절대 좌표
  offset: Position; // 앵커 기준 로컬 좌표
  active: boolean; // 떨어지는 피스의 일부인지
  rendered: boolean;
}

export interface BoardCell {
  position: Position;
  occupied: boolean;
  block: TetrisBlock | null;
}

export interface TetrisBoard {
  columns: number;
  rows: number;
  cells: BoardCell[][]; // cells[행][열]
}

export interface ActivePiece {
  type: TetrominoType;
  position: Position; // 앵커
  blocks: TetrisBlock[][]; // 4x4, blocks[행][열]
  active: boolean; // false = 고정됨 (되돌릴 수 없음)
}

// 게임 상태 컨테이너: 보드와 현재 피스의 유일한 소유자
export interface TetrisGame {
  id: string;
  board: TetrisBoard;
  piece: ActivePiece;
  clock: GravityClock;
  generator: PieceGeneratorState;
  lockedPieces: number;
  linesCleared: number;
  createdAt: Date;
  lastActivity: Date;
}

export type GravityOutcome =
  | { type: 'fell'; position: Position }
  | {
      type: 'locked';
      lockedBlocks: TetrisBlock[];
      clearedRows: number[];
      spawned: ActivePiece;
    };

export interface PollResult {
  gravity: GravityOutcome | null;
}

// 렌더러용 스냅샷
export interface CellSnapshot {
  x: number;
  y: number;
  occupied: boolean;
  type: TetrominoType | null;
  colors: ColorPair | null;
}

export interface BlockSnapshot {
  x: number;
  y: number;
  type: TetrominoType;
  colors: ColorPair;
  rendered: boolean;
}

export interface TetrisMap {
  gameId: string;
  width: number;
  height: number;
  cells: CellSnapshot[][];
  currentPiece: {
    type: TetrominoType;
    position: Position;
    blocks: BlockSnapshot[];
  };
  lockedPieces: number;
  linesCleared: number;
  gravityTicks: number;
  lastUpdated: string;
}
