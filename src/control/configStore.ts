export const CONFIG_KEY = "fur-viewer.config";

export interface GameConfig {
    fullscreen: boolean;
    /** Name of the preferred monitor, null for whichever the page is on */
    monitor: string | null;
    /** Degrees of rotation per pixel of mouse movement */
    mouseSensitivity: number;
    width: number;
    height: number;
}

export const DEFAULT_CONFIG: Readonly<GameConfig> = {
    fullscreen: false,
    monitor: null,
    mouseSensitivity: 0.1,
    width: 1920,
    height: 1080
};

export type ConfigStorage = Pick<Storage, "getItem" | "setItem">;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positive(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value) && value > 0;
}

/**
 * Build a config from untrusted JSON; each bad or missing field falls back
 * to its default on its own.
 */
export function parseConfig(raw: unknown): GameConfig {
    if (!isRecord(raw)) {
        return { ...DEFAULT_CONFIG };
    }

    const { fullscreen, monitor, mouseSensitivity, width, height } = raw;
    return {
        fullscreen: typeof fullscreen === "boolean" ? fullscreen : DEFAULT_CONFIG.fullscreen,
        monitor: typeof monitor === "string" || monitor === null ? monitor : DEFAULT_CONFIG.monitor,
        mouseSensitivity: positive(mouseSensitivity) ? mouseSensitivity : DEFAULT_CONFIG.mouseSensitivity,
        width: positive(width) ? Math.floor(width) || 1 : DEFAULT_CONFIG.width,
        height: positive(height) ? Math.floor(height) || 1 : DEFAULT_CONFIG.height
    };
}

export function loadConfig(storage: ConfigStorage = localStorage): GameConfig {
    const text = storage.getItem(CONFIG_KEY);
    if (text === null) {
        console.log("⚙️ No saved config, using defaults");
        return { ...DEFAULT_CONFIG };
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        console.warn("⚠️ Saved config is not valid JSON, using defaults:", error);
        return { ...DEFAULT_CONFIG };
    }

    if (!isRecord(raw)) {
        console.warn("⚠️ Saved config is not an object, using defaults");
    }
    return parseConfig(raw);
}

export function saveConfig(config: GameConfig, storage: ConfigStorage = localStorage): void {
    try {
        storage.setItem(CONFIG_KEY, JSON.stringify(config));
        console.log("💾 Config saved");
    } catch (error) {
        console.warn("⚠️ Could not save config:", error);
    }
}
