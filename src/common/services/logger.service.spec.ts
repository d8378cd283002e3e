import { Logger } from '@nestjs/common';
import { LoggerService } from './logger.service';

describe('LoggerService', () => {
  const logger = new LoggerService();

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('appends the context as key=value pairs', () => {
    const log = jest
      .spyOn(Logger.prototype, 'log')
      .mockImplementation(() => undefined);

    logger.logGameCreated('game-1', 1000);

    expect(log).toHaveBeenCalledWith(
      'Game created: game-1 (gravity interval: 1000ms) | gameId=game-1 action=GAME_CREATED',
    );
  });

  it('skips undefined context values', () => {
    const log = jest
      .spyOn(Logger.prototype, 'log')
      .mockImplementation(() => undefined);

    logger.log('tick', { gameId: 'game-1', ip: undefined });

    expect(log).toHaveBeenCalledWith('tick | gameId=game-1');
  });

  it('logs non-Error values without a stack', () => {
    const error = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);

    logger.logError('boom');

    expect(error).toHaveBeenCalledWith('Error occurred: boom', undefined);
  });

  it('logs the stack of an Error', () => {
    const error = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
    const failure = new Error('bad board');

    logger.logError(failure, { gameId: 'game-1' });

    expect(error).toHaveBeenCalledWith(
      'Error occurred: bad board | gameId=game-1',
      failure.stack,
    );
  });

  it('reports board violations with the offending position', () => {
    const error = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);

    logger.logBoardViolation({ x: -1, y: 4 }, 'trace', { path: '/games' });

    expect(error).toHaveBeenCalledWith(
      'Board invariant violated at (-1, 4) | path=/games action=BOARD_OUT_OF_BOUNDS',
      'trace',
    );
  });
});
