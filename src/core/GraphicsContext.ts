export class GraphicsSetupError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "GraphicsSetupError";
    }
}

export type SurfaceErrorKind = "outdated" | "lost" | "timeout" | "out-of-memory";

/**
 * Failure to get the next presentable image.
 * Outdated and lost surfaces recover by reconfiguring.
 */
export class SurfaceError extends Error {
    readonly kind: SurfaceErrorKind;

    constructor(kind: SurfaceErrorKind, message: string) {
        super(message);
        this.name = "SurfaceError";
        this.kind = kind;
    }

    get recoverable(): boolean {
        return this.kind === "outdated" || this.kind === "lost";
    }
}

export interface FrameTarget {
    readonly texture: GPUTexture;
    readonly view: GPUTextureView;
    /** Hand the image to the compositor; the browser presents when the task ends */
    present(): void;
    /** Give the image back without presenting it */
    discard(): void;
}

/**
 * GraphicsContext - device, queue and the canvas surface
 */
export default class GraphicsContext {
    readonly canvas: HTMLCanvasElement;
    readonly adapter: GPUAdapter;
    readonly device: GPUDevice;
    readonly queue: GPUQueue;
    readonly context: GPUCanvasContext;
    readonly format: GPUTextureFormat;

    width: number = 1;
    height: number = 1;

    private frameLive: boolean = false;
    private lostInfo: GPUDeviceLostInfo | null = null;

    private constructor(
        canvas: HTMLCanvasElement,
        adapter: GPUAdapter,
        device: GPUDevice,
        context: GPUCanvasContext,
        format: GPUTextureFormat
    ) {
        this.canvas = canvas;
        this.adapter = adapter;
        this.device = device;
        this.queue = device.queue;
        this.context = context;
        this.format = format;

        void device.lost.then((info) => {
            this.lostInfo = info;
            console.error(`❌ GPU device lost (${info.reason}): ${info.message}`);
        });
    }

    static async create(canvas: HTMLCanvasElement, width: number, height: number): Promise<GraphicsContext> {
        if (typeof navigator === "undefined" || !navigator.gpu) {
            throw new GraphicsSetupError("WebGPU is not supported in this browser");
        }

        const adapter = await navigator.gpu.requestAdapter({ powerPreference: "high-performance" });
        if (!adapter) {
            throw new GraphicsSetupError("No suitable GPU adapter found");
        }

        const device = await adapter.requestDevice({ label: "fur viewer" });

        const context = canvas.getContext("webgpu");
        if (!context) {
            throw new GraphicsSetupError("Canvas does not provide a webgpu context");
        }

        const format = navigator.gpu.getPreferredCanvasFormat();
        const graphics = new GraphicsContext(canvas, adapter, device, context, format);
        graphics.configure(width, height);

        console.log(`🖥️ GPU device ready, surface format ${format}`);
        return graphics;
    }

    /**
     * Size the canvas backing store and (re)configure the surface.
     */
    configure(width: number, height: number): void {
        this.width = Math.max(1, Math.floor(width));
        this.height = Math.max(1, Math.floor(height));
        this.canvas.width = this.width;
        this.canvas.height = this.height;

        this.context.configure({
            device: this.device,
            format: this.format,
            alphaMode: "opaque"
        });
    }

    acquireFrame(): FrameTarget {
        if (this.lostInfo) {
            throw new Error(`GPU device lost: ${this.lostInfo.message}`);
        }
        if (this.frameLive) {
            throw new Error("The previous frame target was neither presented nor discarded");
        }
        if (this.canvas.width !== this.width || this.canvas.height !== this.height) {
            throw new SurfaceError(
                "outdated",
                `Canvas is ${this.canvas.width}x${this.canvas.height}, surface is ${this.width}x${this.height}`
            );
        }

        let texture: GPUTexture;
        try {
            texture = this.context.getCurrentTexture();
        } catch (error) {
            if (error instanceof DOMException && error.name === "InvalidStateError") {
                throw new SurfaceError("lost", `Surface lost: ${error.message}`);
            }
            throw error;
        }

        this.frameLive = true;
        let consumed = false;
        const release = () => {
            if (consumed) return;
            consumed = true;
            this.frameLive = false;
        };

        return {
            texture,
            view: texture.createView(),
            present: release,
            discard: release
        };
    }

    destroy(): void {
        this.context.unconfigure();
        this.device.destroy();
    }
}
