import { createCoreServices } from '../common/testing/core-test.helper';
import { TetrisMapService } from './tetris-map.service';

describe('TetrisMapService', () => {
  const { tetrisCore, shapeCatalog, pieceService } = createCoreServices();
  const tetrisMapService = new TetrisMapService(shapeCatalog, pieceService);

  function newGame() {
    return tetrisCore.createGame({
      id: 'game-1',
      intervalMs: 1000,
      sequence: ['T'],
    });
  }

  it('describes an empty board and the falling piece', () => {
    const colors = shapeCatalog.colorsFor('T');
    const snapshot = tetrisMapService.toSnapshot(newGame());

    expect(snapshot.gameId).toBe('game-1');
    expect(snapshot.width).toBe(10);
    expect(snapshot.height).toBe(20);
    expect(snapshot.cells).toHaveLength(20);
    expect(snapshot.cells.flat().some((cell) => cell.occupied)).toBe(false);
    expect(snapshot.cells[3][7]).toEqual({
      x: 7,
      y: 3,
      occupied: false,
      type: null,
      colors: null,
    });
    expect(snapshot.currentPiece.type).toBe('T');
    expect(snapshot.currentPiece.position).toEqual({ x: 4, y: 0 });
    expect(snapshot.currentPiece.blocks).toEqual([
      { x: 5, y: 0, type: 'T', colors, rendered: true },
      { x: 4, y: 1, type: 'T', colors, rendered: true },
      { x: 5, y: 1, type: 'T', colors, rendered: true },
      { x: 6, y: 1, type: 'T', colors, rendered: true },
    ]);
    expect(snapshot.lockedPieces).toBe(0);
    expect(snapshot.gravityTicks).toBe(0);
  });

  it('includes locked cells with their kind and colors', () => {
    const game = newGame();
    for (let i = 0; i < 19; i++) {
      tetrisCore.gravityTick(game);
    }

    const snapshot = tetrisMapService.toSnapshot(game);

    expect(snapshot.lockedPieces).toBe(1);
    expect(snapshot.cells[19][4]).toEqual({
      x: 4,
      y: 19,
      occupied: true,
      type: 'T',
      colors: { primary: '#7b1fa2', secondary: '#ba68c8' },
    });
    expect(snapshot.cells[18][4].occupied).toBe(false);
    expect(snapshot.cells[18][5].occupied).toBe(true);
  });

  it('does not share state with the game', () => {
    const game = newGame();
    const snapshot = tetrisMapService.toSnapshot(game);

    snapshot.currentPiece.position.x = 0;

    expect(game.piece.position.x).toBe(4);
  });
});
