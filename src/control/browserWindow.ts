import type { GameWindow, Monitor, Size } from "../types/platform";

/**
 * BrowserWindow - GameWindow over a page canvas
 *
 * Sizes are device pixels. The page has a single "monitor": the screen it
 * is shown on.
 */
export default class BrowserWindow implements GameWindow {
    readonly canvas: HTMLCanvasElement;

    private redrawHandler: (() => void) | null = null;
    private redrawPending: boolean = false;

    constructor(canvas: HTMLCanvasElement) {
        this.canvas = canvas;
    }

    private get pixelRatio(): number {
        return window.devicePixelRatio || 1;
    }

    innerSize(): Size {
        const rect = this.canvas.getBoundingClientRect();
        const width = rect.width > 0 ? rect.width : window.innerWidth;
        const height = rect.height > 0 ? rect.height : window.innerHeight;
        return {
            width: Math.max(1, Math.round(width * this.pixelRatio)),
            height: Math.max(1, Math.round(height * this.pixelRatio))
        };
    }

    /** A page cannot resize its window, so the canvas is sized instead */
    requestInnerSize(width: number, height: number): void {
        this.canvas.style.maxWidth = "100vw";
        this.canvas.style.maxHeight = "100vh";
        this.canvas.style.width = `${width / this.pixelRatio}px`;
        this.canvas.style.height = `${height / this.pixelRatio}px`;
    }

    setVisible(visible: boolean): void {
        this.canvas.style.visibility = visible ? "visible" : "hidden";
    }

    setCursorVisible(visible: boolean): void {
        if (!visible) {
            void Promise.resolve(this.canvas.requestPointerLock()).catch((error: unknown) => {
                console.warn("⚠️ Pointer lock refused:", error);
            });
        } else if (document.pointerLockElement === this.canvas) {
            document.exitPointerLock();
        }
    }

    isFullscreen(): boolean {
        return document.fullscreenElement !== null;
    }

    setFullscreen(monitor: Monitor | null | false): void {
        if (monitor === false) {
            if (this.isFullscreen()) {
                void document.exitFullscreen().catch((error: unknown) => {
                    console.warn("⚠️ Could not leave fullscreen:", error);
                });
            }
            return;
        }

        // Fullscreen needs a user gesture; at startup the browser may refuse
        void this.canvas.requestFullscreen({ navigationUI: "hide" }).catch((error: unknown) => {
            console.warn(`⚠️ Fullscreen on ${monitor?.name ?? "current screen"} refused:`, error);
        });
    }

    availableMonitors(): Monitor[] {
        return [this.screenMonitor()];
    }

    currentMonitor(): Monitor | null {
        return this.screenMonitor();
    }

    requestRedraw(): void {
        if (this.redrawPending) return;
        this.redrawPending = true;
        requestAnimationFrame(() => {
            this.redrawPending = false;
            this.redrawHandler?.();
        });
    }

    onRedraw(handler: () => void): void {
        this.redrawHandler = handler;
    }

    /**
     * Report device-pixel size changes of the canvas.
     * Returns a function that stops observing.
     */
    onResize(handler: (size: Size) => void): () => void {
        const observer = new ResizeObserver((entries) => {
            for (const entry of entries) {
                const devicePixels = entry.devicePixelContentBoxSize?.[0];
                if (devicePixels) {
                    handler({ width: devicePixels.inlineSize, height: devicePixels.blockSize });
                } else {
                    handler({
                        width: Math.round(entry.contentRect.width * this.pixelRatio),
                        height: Math.round(entry.contentRect.height * this.pixelRatio)
                    });
                }
            }
        });
        observer.observe(this.canvas);
        return () => observer.disconnect();
    }

    private screenMonitor(): Monitor {
        return {
            name: "screen",
            width: Math.round(window.screen.width * this.pixelRatio),
            height: Math.round(window.screen.height * this.pixelRatio)
        };
    }
}
