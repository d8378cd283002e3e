import {
  IsBoolean,
  IsInt,
  IsNumber,
  IsPositive,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ValidationException } from '../exceptions/base.exception';

export const GAME_CONFIG = 'GAME_CONFIG';

export class GameConfig {
  @IsInt()
  @Min(1)
  @Max(65535)
  port = 3000;

  // 중력 틱 주기 = 1000 / updatesPerSecond (ms)
  @IsNumber()
  @IsPositive()
  @Max(60)
  updatesPerSecond = 1;

  // 화면 갱신(폴링) 주기
  @IsInt()
  @Min(1)
  @Max(1000)
  pollIntervalMs = 16;

  @IsBoolean()
  clearFullRows = false;

  // 입력이 없는 게임을 정리하기까지의 시간
  @IsInt()
  @Min(1000)
  idleTimeoutMs = 300000;
}

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value);
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function loadGameConfig(env: Env = process.env): GameConfig {
  const config = new GameConfig();
  config.port = parseNumber(env.PORT, config.port);
  config.updatesPerSecond = parseNumber(
    env.UPDATES_PER_SECOND,
    config.updatesPerSecond,
  );
  config.pollIntervalMs = parseNumber(
    env.POLL_INTERVAL_MS,
    config.pollIntervalMs,
  );
  config.clearFullRows = parseBoolean(env.CLEAR_FULL_ROWS, config.clearFullRows);
  config.idleTimeoutMs = parseNumber(
    env.IDLE_TIMEOUT_MS,
    config.idleTimeoutMs,
  );

  const errors = validateSync(config);
  if (errors.length > 0) {
    throw new ValidationException(
      'Invalid game configuration',
      errors.map((error) => ({
        property: error.property,
        value: error.value,
        constraints: error.constraints,
      })),
    );
  }

  return config;
}
