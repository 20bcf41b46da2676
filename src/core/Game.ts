import { glMatrix } from "gl-matrix";
import GraphicsContext, { type FrameTarget, SurfaceError } from "./GraphicsContext";
import Mesh from "./Mesh";
import Camera from "../model/camera";
import { type MeshAsset, loadMeshAsset } from "../model/meshAsset";
import { CameraBinder, type CameraBinding } from "../view/cameraBinding";
import DepthTexture from "../view/depthTexture";
import FurPipeline from "../view/furPipeline";
import type { GameConfig } from "../control/configStore";
import { type Clock, type GameWindow, type Monitor, MouseButton, performanceClock } from "../types/platform";

export type GameState = "uninitialized" | "running" | "stopped";

export interface GameOptions {
    /** glTF / GLB to put fur on (default: models/spherical-cube.glb) */
    modelUrl?: string;
    loadMesh?: (url: string) => Promise<MeshAsset>;
    clock?: Clock;
    /** Number of fur shells (default: 32) */
    layers?: number;
    furLength?: number;
}

/** Units per second while a movement key is held */
const MOVE_SPEED = 0.5;

/**
 * Game - owns the GPU resources and runs one frame per redraw
 *
 * Usage:
 *   const game = new Game(loadConfig(), new BrowserWindow(canvas));
 *   await game.init();
 *   game.show();
 *   // on each redraw: game.render()
 */
export default class Game {
    state: GameState = "uninitialized";
    readonly config: GameConfig;
    readonly window: GameWindow;

    graphics!: GraphicsContext;
    depthTexture!: DepthTexture;
    cameraBinder!: CameraBinder;
    camera!: Camera;
    cameraBinding!: CameraBinding;
    fur!: FurPipeline;
    mesh!: Mesh;

    // Movement speeds, each in units per second
    forward: number = 0;
    backward: number = 0;
    right: number = 0;
    left: number = 0;
    up: number = 0;
    down: number = 0;

    lookActive: boolean = false;

    private readonly modelUrl: string;
    private readonly loadMesh: (url: string) => Promise<MeshAsset>;
    private readonly clock: Clock;
    private readonly layers: number;
    private readonly furLength: number | undefined;
    private lastFrameTime: number | null = null;

    constructor(config: GameConfig, window: GameWindow, options: GameOptions = {}) {
        this.config = { ...config };
        this.window = window;
        this.modelUrl = options.modelUrl ?? "models/spherical-cube.glb";
        this.loadMesh = options.loadMesh ?? loadMeshAsset;
        this.clock = options.clock ?? performanceClock;
        this.layers = options.layers ?? 32;
        this.furLength = options.furLength;
    }

    async init(): Promise<void> {
        if (this.state !== "uninitialized") {
            throw new Error(`Game cannot initialize from state ${this.state}`);
        }

        try {
            const { width, height } = this.window.innerSize();
            this.graphics = await GraphicsContext.create(this.window.canvas, width, height);
            const { device } = this.graphics;

            this.depthTexture = new DepthTexture(device, this.graphics.width, this.graphics.height);
            this.cameraBinder = new CameraBinder(device);
            this.camera = Camera.lookAt(
                [0, 0, 4],
                [0, 0, 0],
                this.graphics.width,
                this.graphics.height,
                1.0,
                0.1,
                100
            );
            this.cameraBinding = this.cameraBinder.bind(device, this.camera);
            this.fur = new FurPipeline(
                device,
                this.layers,
                this.graphics.format,
                this.depthTexture.format,
                this.cameraBinder,
                { furLength: this.furLength }
            );

            const asset = await this.loadMesh(this.modelUrl);
            this.mesh = Mesh.fromAsset(device, asset);

            this.applyWindowPreferences();
            this.state = "running";
            console.log(`🎮 Game running: ${asset.name} with ${this.layers} fur layers`);
        } catch (error) {
            // Release whatever was created; a failed game does not restart
            this.destroy();
            throw error;
        }
    }

    render(): void {
        if (!this.isRunning()) return;

        this.window.requestRedraw();

        let frame: FrameTarget;
        try {
            frame = this.graphics.acquireFrame();
        } catch (error) {
            if (error instanceof SurfaceError && error.recoverable) {
                console.warn(`⚠️ Surface ${error.kind}, reconfiguring and skipping frame`);
                const { width, height } = this.window.innerSize();
                this.resize(width, height);
                return;
            }
            console.error("❌ Could not acquire a frame, stopping:", error);
            this.stop();
            return;
        }

        const now = this.clock.now();
        const dt = this.lastFrameTime === null ? 0 : (now - this.lastFrameTime) / 1000;
        this.lastFrameTime = now;

        try {
            this.camera.walkForward((this.forward - this.backward) * dt);
            this.camera.walkRight((this.right - this.left) * dt);
            this.camera.levitateUp((this.up - this.down) * dt);
            this.cameraBinding.update(this.graphics.queue, this.camera);

            const encoder = this.graphics.device.createCommandEncoder({ label: "frame" });
            const pass = encoder.beginRenderPass({
                label: "fur",
                colorAttachments: [
                    {
                        view: frame.view,
                        clearValue: { r: 0.0, g: 0.0, b: 0.0, a: 1.0 },
                        loadOp: "clear",
                        storeOp: "store"
                    }
                ],
                depthStencilAttachment: this.depthTexture.attachment
            });
            this.fur.draw(pass, this.mesh, this.cameraBinding);
            pass.end();

            this.graphics.queue.submit([encoder.finish()]);
            frame.present();
        } catch (error) {
            frame.discard();
            console.error("❌ Frame failed, stopping:", error);
            this.stop();
        }
    }

    resize(width: number, height: number): void {
        if (this.state === "uninitialized") return;

        this.graphics.configure(width, height);
        this.camera.resize(this.graphics.width, this.graphics.height);
        this.depthTexture.resize(this.graphics.device, this.graphics.width, this.graphics.height);
        console.log(`📐 Surface resized to ${this.graphics.width}x${this.graphics.height}`);
    }

    handleKeyboard(code: string, pressed: boolean): void {
        const speed = pressed ? MOVE_SPEED : 0;
        switch (code) {
            case "Escape":
                if (pressed) this.stop();
                break;
            case "F11":
                if (pressed) this.toggleFullscreen();
                break;
            case "KeyW":
                this.forward = speed;
                break;
            case "KeyS":
                this.backward = speed;
                break;
            case "KeyD":
                this.right = speed;
                break;
            case "KeyA":
                this.left = speed;
                break;
            case "Space":
                this.up = speed;
                break;
            case "ShiftLeft":
                this.down = speed;
                break;
        }
    }

    handleMouseButton(button: number, pressed: boolean): void {
        if (button !== MouseButton.Left) return;

        this.lookActive = pressed;
        this.window.setCursorVisible(!pressed);
    }

    /**
     * Mouse motion in pixels. Axis 0 is horizontal, axis 1 vertical
     * (positive down, as in MouseEvent.movementY).
     */
    handleAxis(axis: number, value: number): void {
        if (!this.lookActive || !this.isRunning()) return;

        const radiansPerPixel = glMatrix.toRadian(this.config.mouseSensitivity);
        if (axis === 0) {
            this.camera.rotateRight(value * radiansPerPixel);
        } else if (axis === 1) {
            this.camera.rotateUp(-value * radiansPerPixel);
        }
    }

    toggleFullscreen(): void {
        if (this.window.isFullscreen()) {
            this.window.setFullscreen(false);
            console.log("🪟 Leaving fullscreen");
        } else {
            this.window.setFullscreen(null);
            console.log("🖥️ Entering fullscreen");
        }
    }

    show(): void {
        this.window.setVisible(true);
    }

    isRunning(): boolean {
        return this.state === "running";
    }

    stop(): void {
        if (this.state === "stopped") return;
        this.state = "stopped";
        console.log("🛑 Game stopped");
    }

    exportConfig(): GameConfig {
        const { width, height } = this.window.innerSize();
        return {
            fullscreen: this.window.isFullscreen(),
            monitor: this.window.currentMonitor()?.name ?? null,
            mouseSensitivity: this.config.mouseSensitivity,
            width,
            height
        };
    }

    destroy(): void {
        this.stop();
        if (!this.graphics) return;

        this.mesh?.destroy();
        this.cameraBinding?.destroy();
        this.depthTexture?.destroy();
        this.graphics.destroy();
    }

    private applyWindowPreferences(): void {
        if (this.config.fullscreen) {
            this.window.setFullscreen(findOrFirst(this.window.availableMonitors(), this.config.monitor));
        } else {
            this.window.requestInnerSize(this.config.width, this.config.height);
        }
    }
}

/**
 * Monitor with the given name, else the first one available.
 */
export function findOrFirst(monitors: Monitor[], name: string | null): Monitor | null {
    return monitors.find((monitor) => monitor.name === name) ?? monitors[0] ?? null;
}
