import { IsIn } from 'class-validator';
import {
  MOVE_DIRECTIONS,
  MoveDirection,
} from '../common/interfaces/shared.interface';

export class MovePieceDto {
  @IsIn([...MOVE_DIRECTIONS])
  direction!: MoveDirection;
}
