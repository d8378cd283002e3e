import { Injectable } from '@nestjs/common';
import { TETROMINO_TYPES } from '../constants/tetrominos';
import { TetrisLogicException } from '../exceptions/base.exception';
import {
  PieceGeneratorOptions,
  PieceGeneratorState,
} from '../interfaces/piece-generator.interface';
import { TetrominoType } from '../interfaces/shared.interface';

@Injectable()
export class PieceGeneratorService {
  createState(options: PieceGeneratorOptions = {}): PieceGeneratorState {
    if (options.sequence !== undefined && options.sequence.length === 0) {
      throw new TetrisLogicException('Piece sequence must not be empty');
    }

    const state: PieceGeneratorState = {
      sequence: options.sequence ? [...options.sequence] : null,
      // LCG 상태는 32비트: 큰 시드도 가방마다 다른 순서가 나오도록 접음
      seed: options.seed === undefined ? null : options.seed >>> 0,
      bag: [],
      bagIndex: 0,
      bagNumber: 1,
    };

    if (!state.sequence) {
      state.bag = this.createBag(
        state.seed === null ? Math.random : this.createSeededRandom(state.seed),
      );
    }

    return state;
  }

  // 다음 테트로미노 가져오기
  next(state: PieceGeneratorState): TetrominoType {
    if (state.sequence) {
      const type = state.sequence[state.bagIndex % state.sequence.length];
      state.bagIndex++;
      return type;
    }

    // 가방을 모두 사용했으면 새로운 가방 생성
    if (state.bagIndex >= state.bag.length) {
      state.bagNumber++;
      // 시드에 가방 번호를 더해 가방마다 다른 순서 생성
      const random =
        state.seed === null
          ? Math.random
          : this.createSeededRandom((state.seed + state.bagNumber) >>> 0);
      state.bag = this.createBag(random);
      state.bagIndex = 0;
    }

    const type = state.bag[state.bagIndex];
    state.bagIndex++;
    return type;
  }

  // 7-bag 셔플 (Fisher-Yates)
  private createBag(random: () => number): TetrominoType[] {
    const bag = [...TETROMINO_TYPES];
    for (let i = bag.length - 1; i > 0; i--) {
      const j = Math.floor(random() * (i + 1));
      [bag[i], bag[j]] = [bag[j], bag[i]];
    }
    return bag;
  }

  // 시드 기반 랜덤 생성기 (LCG)
  private createSeededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
      state = (state * 1664525 + 1013904223) % 0x100000000;
      // [0, 1) 범위 유지
      return (state & 0x7fffffff) / 0x80000000;
    };
  }
}
