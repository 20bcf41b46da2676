import type Camera from "../model/camera";
import { createBufferInit } from "../core/bufferInit";

/**
 * Owns the bind group layout every technique uses for group 0.
 */
export class CameraBinder {
    readonly layout: GPUBindGroupLayout;

    constructor(device: GPUDevice) {
        this.layout = device.createBindGroupLayout({
            label: "camera",
            entries: [
                {
                    binding: 0,
                    visibility: GPUShaderStage.VERTEX,
                    buffer: {} // Uniform buffer for view-projection
                }
            ]
        });
    }

    bind(device: GPUDevice, camera: Camera): CameraBinding {
        const buffer = createBufferInit(
            device,
            new Float32Array(camera.getViewProjection()),
            GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
            "camera uniform"
        );
        const bindGroup = device.createBindGroup({
            label: "camera",
            layout: this.layout,
            entries: [{ binding: 0, resource: { buffer } }]
        });
        return new CameraBinding(buffer, bindGroup);
    }
}

export class CameraBinding {
    readonly buffer: GPUBuffer;
    readonly bindGroup: GPUBindGroup;

    constructor(buffer: GPUBuffer, bindGroup: GPUBindGroup) {
        this.buffer = buffer;
        this.bindGroup = bindGroup;
    }

    update(queue: GPUQueue, camera: Camera): void {
        queue.writeBuffer(this.buffer, 0, new Float32Array(camera.getViewProjection()));
    }

    destroy(): void {
        this.buffer.destroy();
    }
}
