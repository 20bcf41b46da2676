import $ from "jquery";
import { Game } from "../core";
import BrowserWindow from "./browserWindow";
import { type ConfigStorage, loadConfig, saveConfig } from "./configStore";

export default class App {

    canvas: HTMLCanvasElement;
    window: BrowserWindow;
    game: Game;

    private readonly storage: ConfigStorage;
    private stopResizeObserver: (() => void) | null = null;
    private shutDown: boolean = false;

    constructor(canvas: HTMLCanvasElement, storage: ConfigStorage = localStorage) {
        this.canvas = canvas;
        this.storage = storage;
        this.window = new BrowserWindow(canvas);
        this.game = new Game(loadConfig(storage), this.window);
    }

    async init() {
        await this.game.init();

        $(document).on("keydown", this.handleKeyPress);
        $(document).on("keyup", this.handleKeyRelease);
        $(this.canvas).on("mousedown", this.handleMouseDown);
        // Released anywhere, not only over the canvas
        $(document).on("mouseup", this.handleMouseUp);
        $(document).on("mousemove", this.handleMouseMove);
        $(window).on("pagehide", this.persistConfig);

        this.stopResizeObserver = this.window.onResize(({ width, height }) => {
            this.game.resize(width, height);
        });
        this.window.onRedraw(this.run);

        this.game.show();
    }

    run = (): void => {
        if (this.game.isRunning()) {
            this.game.render();
        }
        if (!this.game.isRunning()) {
            this.shutdown();
        }
    }

    handleKeyPress = (event: JQuery.KeyDownEvent): void => {
        const original = event.originalEvent;
        if (!original || original.repeat) return;
        if (original.code === "F11" || original.code === "Space") {
            event.preventDefault();
        }
        this.game.handleKeyboard(original.code, true);
    }

    handleKeyRelease = (event: JQuery.KeyUpEvent): void => {
        const original = event.originalEvent;
        if (!original) return;
        this.game.handleKeyboard(original.code, false);
    }

    handleMouseDown = (event: JQuery.MouseDownEvent): void => {
        this.game.handleMouseButton(event.button, true);
    }

    handleMouseUp = (event: JQuery.MouseUpEvent): void => {
        this.game.handleMouseButton(event.button, false);
    }

    handleMouseMove = (event: JQuery.MouseMoveEvent): void => {
        const original = event.originalEvent;
        if (!original) return;

        if (original.movementX !== 0) this.game.handleAxis(0, original.movementX);
        if (original.movementY !== 0) this.game.handleAxis(1, original.movementY);
    }

    persistConfig = (): void => {
        saveConfig(this.game.exportConfig(), this.storage);
    }

    private shutdown(): void {
        if (this.shutDown) return;
        this.shutDown = true;

        this.persistConfig();

        $(document).off("keydown", this.handleKeyPress);
        $(document).off("keyup", this.handleKeyRelease);
        $(this.canvas).off("mousedown", this.handleMouseDown);
        $(document).off("mouseup", this.handleMouseUp);
        $(document).off("mousemove", this.handleMouseMove);
        $(window).off("pagehide", this.persistConfig);
        this.stopResizeObserver?.();

        this.window.setCursorVisible(true);
        this.game.destroy();
        console.log("👋 Viewer shut down");
    }
}
