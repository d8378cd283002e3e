import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  IsOptional,
  Max,
  Min,
} from 'class-validator';
import { TETROMINO_TYPES } from '../common/constants/tetrominos';
import { TetrominoType } from '../common/interfaces/shared.interface';

export class CreateGameDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(0xffffffff)
  seed?: number;

  // 지정하면 이 순서대로 피스가 반복 스폰됨
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsIn([...TETROMINO_TYPES], { each: true })
  sequence?: TetrominoType[];
}
