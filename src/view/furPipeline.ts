import shader from "./fur.wgsl?raw";
import { VERTEX_BUFFER_LAYOUT } from "../model/definitions";
import type { CameraBinder, CameraBinding } from "./cameraBinding";
import type Mesh from "../core/Mesh";

export interface FurOptions {
    /** Distance of the outermost shell from the skin (default: 0.2) */
    furLength?: number;
}

/**
 * FurPipeline - instanced shell rendering
 *
 * Every mesh is drawn once per layer; the instance index picks how far the
 * shell is pushed out along the vertex normal.
 */
export default class FurPipeline {
    readonly pipeline: GPURenderPipeline;
    readonly layers: number;

    constructor(
        device: GPUDevice,
        layers: number,
        surfaceFormat: GPUTextureFormat,
        depthFormat: GPUTextureFormat,
        cameraBinder: CameraBinder,
        options: FurOptions = {}
    ) {
        const { furLength = 0.2 } = options;
        this.layers = layers;

        const module = device.createShaderModule({ label: "fur", code: shader });
        const layout = device.createPipelineLayout({
            label: "fur",
            bindGroupLayouts: [cameraBinder.layout]
        });

        this.pipeline = device.createRenderPipeline({
            label: "fur",
            layout,
            vertex: {
                module,
                entryPoint: "displace_vertices",
                buffers: [VERTEX_BUFFER_LAYOUT],
                constants: {
                    layer_count: layers,
                    fur_length: furLength
                }
            },
            fragment: {
                module,
                entryPoint: "shade_fur",
                targets: [{ format: surfaceFormat }]
            },
            primitive: {
                topology: "triangle-list"
            },
            depthStencil: {
                format: depthFormat,
                depthWriteEnabled: true,
                depthCompare: "less"
            }
        });
    }

    draw(pass: GPURenderPassEncoder, mesh: Mesh, camera: CameraBinding): void {
        pass.setPipeline(this.pipeline);
        pass.setBindGroup(0, camera.bindGroup);
        pass.setIndexBuffer(mesh.indexBuffer, mesh.indexFormat);
        pass.setVertexBuffer(0, mesh.vertexBuffer);
        pass.drawIndexed(mesh.indexCount, this.layers);
    }
}
