import { TetrominoType } from './shared.interface';

export interface PieceGeneratorOptions {
  seed?: number;
  sequence?: TetrominoType[];
}

export interface PieceGeneratorState {
  // 고정 시퀀스가 있으면 bag 대신 순환 사용
  sequence: TetrominoType[] | null;
  seed: number | null;
  bag: TetrominoType[];
  bagIndex: number;
  bagNumber: number;
}
