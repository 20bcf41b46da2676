import { createBufferInit } from "./bufferInit";
import { type IndexFormat, morphSize, vertexSize } from "../model/definitions";
import type { MeshAsset } from "../model/meshAsset";

const VERTEX_FLOATS = vertexSize / Float32Array.BYTES_PER_ELEMENT;
const MORPH_FLOATS = morphSize / Float32Array.BYTES_PER_ELEMENT;

/**
 * Mesh - GPU-resident buffers of one loaded model
 *
 * Vertex buffer is interleaved position/normal/uv (VERTEX_BUFFER_LAYOUT).
 * The optional morph buffer holds two position/normal delta pairs per vertex.
 */
export default class Mesh {
    readonly vertexBuffer: GPUBuffer;
    readonly indexBuffer: GPUBuffer;
    readonly morphBuffer: GPUBuffer | null;
    readonly indexFormat: IndexFormat;
    readonly indexCount: number;
    readonly vertexCount: number;

    private constructor(
        vertexBuffer: GPUBuffer,
        indexBuffer: GPUBuffer,
        morphBuffer: GPUBuffer | null,
        indexFormat: IndexFormat,
        indexCount: number,
        vertexCount: number
    ) {
        this.vertexBuffer = vertexBuffer;
        this.indexBuffer = indexBuffer;
        this.morphBuffer = morphBuffer;
        this.indexFormat = indexFormat;
        this.indexCount = indexCount;
        this.vertexCount = vertexCount;
    }

    static fromAsset(device: GPUDevice, asset: MeshAsset): Mesh {
        const vertices = new Float32Array(asset.vertexCount * VERTEX_FLOATS);
        for (let i = 0; i < asset.vertexCount; i++) {
            const o = i * VERTEX_FLOATS;
            vertices.set(asset.positions.subarray(i * 3, i * 3 + 3), o);
            vertices.set(asset.normals.subarray(i * 3, i * 3 + 3), o + 3);
            vertices.set(asset.texCoords.subarray(i * 2, i * 2 + 2), o + 6);
        }

        const vertexBuffer = createBufferInit(
            device, vertices, GPUBufferUsage.VERTEX, `${asset.name} vertices`
        );
        // Padded to 4 bytes when a u16 index count is odd
        const indexBuffer = createBufferInit(
            device, asset.indices, GPUBufferUsage.INDEX, `${asset.name} indices`
        );

        let morphBuffer: GPUBuffer | null = null;
        if (asset.morphTargets) {
            const [first, second] = asset.morphTargets;
            const count = first.positions.length / 3;
            const morphs = new Float32Array(count * MORPH_FLOATS);
            for (let i = 0; i < count; i++) {
                const o = i * MORPH_FLOATS;
                morphs.set(first.positions.subarray(i * 3, i * 3 + 3), o);
                morphs.set(first.normals.subarray(i * 3, i * 3 + 3), o + 3);
                morphs.set(second.positions.subarray(i * 3, i * 3 + 3), o + 6);
                morphs.set(second.normals.subarray(i * 3, i * 3 + 3), o + 9);
            }
            morphBuffer = createBufferInit(device, morphs, GPUBufferUsage.VERTEX, `${asset.name} morphs`);
        }

        return new Mesh(
            vertexBuffer,
            indexBuffer,
            morphBuffer,
            asset.indexFormat,
            asset.indices.length,
            asset.vertexCount
        );
    }

    destroy(): void {
        this.vertexBuffer.destroy();
        this.indexBuffer.destroy();
        this.morphBuffer?.destroy();
    }
}
