import { Injectable } from '@nestjs/common';
import {
  TETROMINO_COLORS,
  TETROMINO_SHAPES,
  TETROMINO_TYPES,
} from '../constants/tetrominos';
import {
  ColorPair,
  Position,
  TetrominoType,
} from '../interfaces/shared.interface';

@Injectable()
export class ShapeCatalogService {
  kinds(): TetrominoType[] {
    return [...TETROMINO_TYPES];
  }

  shapeFor(type: TetrominoType): readonly Position[] {
    return TETROMINO_SHAPES[type];
  }

  colorsFor(type: TetrominoType): ColorPair {
    return TETROMINO_COLORS[type];
  }

  isOccupiedInShape(type: TetrominoType, local: Position): boolean {
    return TETROMINO_SHAPES[type].some(
      (cell) => cell.x === local.x && cell.y === local.y,
    );
  }
}
