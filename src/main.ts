import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';
import { Logger } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { GAME_CONFIG, GameConfig } from './common/config/game.config';
import { LoggerService } from './common/services/logger.service';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  // 전역 예외 필터 등록
  app.useGlobalFilters(new GlobalExceptionFilter(app.get(LoggerService)));

  // CORS 설정
  app.enableCors();
  app.enableShutdownHooks();

  const config = app.get<GameConfig>(GAME_CONFIG);
  const logger = new Logger('Bootstrap');

  await app.listen(config.port);
  logger.log(`Application is running on: http://localhost:${config.port}`);
  logger.log(`Environment: ${process.env.NODE_ENV || 'development'}`);
  logger.log(
    `Gravity: ${config.updatesPerSecond} updates/s, poll every ${config.pollIntervalMs}ms`,
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start application',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
