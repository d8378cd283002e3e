import {
  ColorPair,
  Position,
  TetrominoType,
} from '../interfaces/shared.interface';

// 보드 크기 (열 x 행)
export const BOARD_COLUMNS = 10;
export const BOARD_ROWS = 20;

// 피스 로컬 그리드 크기
export const PIECE_GRID_SIZE = 4;

// 모든 피스는 같은 위치에서 스폰
export const SPAWN_POSITION: Readonly<Position> = { x: 4, y: 0 };

export const TETROMINO_TYPES: readonly TetrominoType[] = [
  'I',
  'J',
  'L',
  'O',
  'S',
  'T',
  'Z',
];

// 4x4 로컬 그리드 안에서 채워진 칸 (x = 피스 내 열, y = 피스 내 행)
export const TETROMINO_SHAPES: Readonly<
  Record<TetrominoType, readonly Position[]>
> = {
  I: [
    { x: 0, y: 0 },
    { x: 1, y: 0 },
    { x: 2, y: 0 },
    { x: 3, y: 0 },
  ],
  J: [
    { x: 0, y: 0 },
    { x: 0, y: 1 },
    { x: 1, y: 1 },
    { x: 2, y: 1 },
  ],
  L: [
    { x: 2, y: 0 },
    { x: 0, y: 1 },
    { x: 1, y: 1 },
    { x: 2, y: 1 },
  ],
  O: [
    { x: 0, y: 0 },
    { x: 0, y: 1 },
    { x: 1, y: 0 },
    { x: 1, y: 1 },
  ],
  S: [
    { x: 1, y: 0 },
    { x: 2, y: 0 },
    { x: 0, y: 1 },
    { x: 1, y: 1 },
  ],
  T: [
    { x: 1, y: 0 },
    { x: 0, y: 1 },
    { x: 1, y: 1 },
    { x: 2, y: 1 },
  ],
  Z: [
    { x: 0, y: 0 },
    { x: 1, y: 0 },
    { x: 1, y: 1 },
    { x: 2, y: 1 },
  ],
};

// 블록 색상: primary = 바깥 테두리(어두운 색), secondary = 안쪽(밝은 색)
export const TETROMINO_COLORS: Readonly<Record<TetrominoType, ColorPair>> = {
  I: { primary: '#0097a7', secondary: '#4dd0e1' },
  J: { primary: '#1a3fb0', secondary: '#5c7cfa' },
  L: { primary: '#f27d00', secondary: '#ffac54' },
  O: { primary: '#c9a700', secondary: '#ffe14d' },
  S: { primary: '#2e8b2e', secondary: '#66cc66' },
  T: { primary: '#7b1fa2', secondary: '#ba68c8' },
  Z: { primary: '#c80000', secondary: '#fa0000' },
};
