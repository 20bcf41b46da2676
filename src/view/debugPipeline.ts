import shader from "./debug.wgsl?raw";
import StagedBuffer, { U32_RECORD, type WriteBatch } from "../core/StagedBuffer";
import { DEBUG_VERTEX_BUFFER_LAYOUT, DEBUG_VERTEX_RECORD, type DebugVertex } from "../model/definitions";
import type { CameraBinder, CameraBinding } from "./cameraBinding";

const INITIAL_CAPACITY = 64;

/**
 * Appends line vertices and their indices as one transaction.
 * Indices continue from the vertex count at the time the batch opened.
 */
export class DebugBatch {
    private readonly vertices: WriteBatch<DebugVertex>;
    private readonly indices: WriteBatch<number>;
    private currentVertex: number;

    constructor(vertices: WriteBatch<DebugVertex>, indices: WriteBatch<number>) {
        this.vertices = vertices;
        this.indices = indices;
        this.currentVertex = vertices.start;
    }

    pushVertex(vertex: DebugVertex): this {
        this.vertices.push(vertex);
        this.indices.push(this.currentVertex);
        this.currentVertex++;
        return this;
    }

    /** Adds one line segment in a single colour */
    pushLine(from: DebugVertex["position"], to: DebugVertex["position"], color: DebugVertex["color"]): this {
        return this.pushVertex({ position: from, color }).pushVertex({ position: to, color });
    }

    close(): void {
        try {
            this.vertices.close();
        } finally {
            this.indices.close();
        }
    }
}

/**
 * DebugPipeline - unlit line overlay
 *
 * Not part of the main frame; callers batch lines and call drawLines on a
 * pass of their own.
 */
export default class DebugPipeline {
    readonly pipeline: GPURenderPipeline;
    readonly vertexBuffer: StagedBuffer<DebugVertex>;
    readonly indexBuffer: StagedBuffer<number>;

    constructor(device: GPUDevice, surfaceFormat: GPUTextureFormat, cameraBinder: CameraBinder) {
        const module = device.createShaderModule({ label: "debug", code: shader });
        const layout = device.createPipelineLayout({
            label: "debug",
            bindGroupLayouts: [cameraBinder.layout]
        });

        this.pipeline = device.createRenderPipeline({
            label: "debug",
            layout,
            vertex: {
                module,
                entryPoint: "displace_vertices",
                buffers: [DEBUG_VERTEX_BUFFER_LAYOUT]
            },
            fragment: {
                module,
                entryPoint: "draw",
                targets: [{ format: surfaceFormat }]
            },
            primitive: {
                topology: "line-list"
            }
        });

        this.vertexBuffer = StagedBuffer.withCapacity(
            device, DEBUG_VERTEX_RECORD, INITIAL_CAPACITY, GPUBufferUsage.VERTEX, "debug vertices"
        );
        this.indexBuffer = StagedBuffer.withCapacity(
            device, U32_RECORD, INITIAL_CAPACITY, GPUBufferUsage.INDEX, "debug indices"
        );
    }

    batch(device: GPUDevice, queue: GPUQueue): DebugBatch {
        const vertices = this.vertexBuffer.batch(device, queue);
        try {
            return new DebugBatch(vertices, this.indexBuffer.batch(device, queue));
        } catch (error) {
            vertices.close();
            throw error;
        }
    }

    write<R>(device: GPUDevice, queue: GPUQueue, fn: (batch: DebugBatch) => R): R {
        const batch = this.batch(device, queue);
        try {
            return fn(batch);
        } finally {
            batch.close();
        }
    }

    clear(): void {
        this.vertexBuffer.clear();
        this.indexBuffer.clear();
    }

    drawLines(pass: GPURenderPassEncoder, camera: CameraBinding): void {
        if (this.indexBuffer.length === 0) return;

        pass.setPipeline(this.pipeline);
        pass.setBindGroup(0, camera.bindGroup);
        pass.setVertexBuffer(0, this.vertexBuffer.gpuBuffer);
        pass.setIndexBuffer(this.indexBuffer.gpuBuffer, "uint32");
        pass.drawIndexed(this.indexBuffer.length);
    }

    destroy(): void {
        this.vertexBuffer.destroy();
        this.indexBuffer.destroy();
    }
}
