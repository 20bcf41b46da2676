export const DEPTH_FORMAT: GPUTextureFormat = "depth32float";

/**
 * Depth attachment matching the surface size.
 * Rebuilt on every resize; the previous texture is destroyed first.
 */
export default class DepthTexture {
    readonly format: GPUTextureFormat = DEPTH_FORMAT;
    texture!: GPUTexture;
    view!: GPUTextureView;
    width: number = 0;
    height: number = 0;

    constructor(device: GPUDevice, width: number, height: number) {
        this.allocate(device, width, height);
    }

    resize(device: GPUDevice, width: number, height: number): void {
        this.texture.destroy();
        this.allocate(device, width, height);
    }

    private allocate(device: GPUDevice, width: number, height: number): void {
        this.width = Math.max(1, width);
        this.height = Math.max(1, height);
        this.texture = device.createTexture({
            label: "depth",
            size: {
                width: this.width,
                height: this.height,
                depthOrArrayLayers: 1
            },
            format: this.format,
            usage: GPUTextureUsage.RENDER_ATTACHMENT | GPUTextureUsage.TEXTURE_BINDING
        });
        this.view = this.texture.createView({
            format: this.format,
            dimension: "2d",
            aspect: "depth-only"
        });
    }

    get attachment(): GPURenderPassDepthStencilAttachment {
        return {
            view: this.view,
            depthClearValue: 1.0,
            depthLoadOp: "clear",
            depthStoreOp: "store"
        };
    }

    destroy(): void {
        this.texture.destroy();
    }
}
