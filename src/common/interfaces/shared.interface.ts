// 공통 타입 정의
export type TetrominoType = 'I' | 'J' | 'L' | 'O' | 'S' | 'T' | 'Z';

// x = 열, y = 행
export interface Position {
  x: number;
  y: number;
}

export type MoveDirection = 'LEFT' | 'RIGHT';

export const MOVE_DIRECTIONS: readonly MoveDirection[] = ['LEFT', 'RIGHT'];

export interface ColorPair {
  primary: string;
  secondary: string;
}

// 에러 응답 타입
export interface ErrorResponse {
  code: string;
  message: string;
  details?: unknown;
}

// 성공 응답 타입
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
  timestamp: string;
}

export function addPositions(a: Position, b: Position): Position {
  return { x: a.x + b.x, y: a.y + b.y };
}
