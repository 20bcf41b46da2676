/**
 * Core module - frame orchestration and GPU resources
 *
 * Usage:
 * ```typescript
 * import { Game } from './core';
 *
 * const game = new Game(loadConfig(), new BrowserWindow(canvas));
 * await game.init();
 * game.show();
 *
 * // Render loop: Game.render() asks the window for the next redraw
 * window.onRedraw(() => game.render());
 * game.render();
 * ```
 */

export { default as Game, type GameOptions, type GameState, findOrFirst } from './Game';
export {
    default as GraphicsContext,
    type FrameTarget,
    GraphicsSetupError,
    SurfaceError,
    type SurfaceErrorKind
} from './GraphicsContext';
export { default as Mesh } from './Mesh';
export { default as StagedBuffer, WriteBatch, type RecordLayout, U32_RECORD } from './StagedBuffer';
export { createBufferInit } from './bufferInit';
