import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
    CONFIG_KEY,
    type ConfigStorage,
    DEFAULT_CONFIG,
    type GameConfig,
    loadConfig,
    parseConfig,
    saveConfig
} from "./configStore";

class MemoryStorage implements ConfigStorage {
    readonly items = new Map<string, string>();

    getItem(key: string): string | null {
        return this.items.get(key) ?? null;
    }

    setItem(key: string, value: string): void {
        this.items.set(key, value);
    }
}

describe("configStore", () => {
    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("uses defaults when nothing was saved", () => {
        expect(loadConfig(new MemoryStorage())).toEqual({
            fullscreen: false,
            monitor: null,
            mouseSensitivity: 0.1,
            width: 1920,
            height: 1080
        });
    });

    it("round-trips a saved config", () => {
        const storage = new MemoryStorage();
        const config: GameConfig = {
            fullscreen: true,
            monitor: "Studio Display",
            mouseSensitivity: 0.25,
            width: 1280,
            height: 720
        };

        saveConfig(config, storage);

        expect(storage.items.get(CONFIG_KEY)).toBe(JSON.stringify(config));
        expect(loadConfig(storage)).toEqual(config);
    });

    it("falls back field by field", () => {
        expect(parseConfig({
            fullscreen: "yes",
            monitor: 3,
            mouseSensitivity: -1,
            width: 1024.7,
            height: "tall"
        })).toEqual({
            fullscreen: false,
            monitor: null,
            mouseSensitivity: 0.1,
            width: 1024,
            height: 1080
        });
    });

    it("keeps an explicit null monitor", () => {
        expect(parseConfig({ monitor: null, fullscreen: true }).monitor).toBeNull();
    });

    it("warns and uses defaults for unreadable JSON", () => {
        const storage = new MemoryStorage();
        storage.setItem(CONFIG_KEY, "{not json");

        expect(loadConfig(storage)).toEqual(DEFAULT_CONFIG);
        expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it("treats a non-object payload as defaults", () => {
        const storage = new MemoryStorage();
        storage.setItem(CONFIG_KEY, "[1,2]");

        expect(loadConfig(storage)).toEqual(DEFAULT_CONFIG);
        expect(console.warn).toHaveBeenCalledWith("⚠️ Saved config is not an object, using defaults");
    });

    it("logs instead of throwing when storage is full", () => {
        const storage: ConfigStorage = {
            getItem: () => null,
            setItem: () => {
                throw new Error("quota exceeded");
            }
        };

        expect(() => saveConfig(DEFAULT_CONFIG, storage)).not.toThrow();
        expect(console.warn).toHaveBeenCalledWith("⚠️ Could not save config:", new Error("quota exceeded"));
    });
});
