/**
 * Platform seams the Game talks to. The browser implementations live in
 * src/control; tests provide in-memory ones.
 */

export interface Size {
    width: number;
    height: number;
}

export interface Monitor {
    name: string;
    width: number;
    height: number;
}

/** Matches MouseEvent.button */
export enum MouseButton {
    Left = 0,
    Middle = 1,
    Right = 2
}

export interface GameWindow {
    readonly canvas: HTMLCanvasElement;

    innerSize(): Size;
    requestInnerSize(width: number, height: number): void;
    setVisible(visible: boolean): void;
    setCursorVisible(visible: boolean): void;

    isFullscreen(): boolean;
    /** `false` leaves fullscreen; `null` picks the current monitor */
    setFullscreen(monitor: Monitor | null | false): void;
    availableMonitors(): Monitor[];
    currentMonitor(): Monitor | null;

    requestRedraw(): void;
}

export interface Clock {
    /** Milliseconds */
    now(): number;
}

export const performanceClock: Clock = {
    now: () => performance.now()
};
