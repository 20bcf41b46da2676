import type { vec3 } from "gl-matrix";
import type { RecordLayout } from "../core/StagedBuffer";

export type IndexFormat = "uint16" | "uint32";

/**
 * Mesh vertex: position, normal, texcoord
 */
export const vertexSize =
    3 * Float32Array.BYTES_PER_ELEMENT + // Position
    3 * Float32Array.BYTES_PER_ELEMENT + // Normal
    2 * Float32Array.BYTES_PER_ELEMENT;  // UV

export const VERTEX_BUFFER_LAYOUT: GPUVertexBufferLayout = {
    arrayStride: vertexSize,
    stepMode: "vertex",
    attributes: [
        { shaderLocation: 0, format: "float32x3", offset: 0 },     // position
        { shaderLocation: 1, format: "float32x3", offset: 3 * 4 }, // normal
        { shaderLocation: 2, format: "float32x2", offset: 6 * 4 }  // uv
    ]
};

/**
 * Per-vertex deltas of the two morph targets
 */
export const morphSize = 4 * 3 * Float32Array.BYTES_PER_ELEMENT;

export interface DebugVertex {
    position: vec3;
    color: vec3;
}

export const debugVertexSize =
    3 * Float32Array.BYTES_PER_ELEMENT + // Position
    3 * Float32Array.BYTES_PER_ELEMENT;  // Color

export const DEBUG_VERTEX_BUFFER_LAYOUT: GPUVertexBufferLayout = {
    arrayStride: debugVertexSize,
    stepMode: "vertex",
    attributes: [
        { shaderLocation: 0, format: "float32x3", offset: 0 },
        { shaderLocation: 1, format: "float32x3", offset: 3 * 4 }
    ]
};

export const DEBUG_VERTEX_RECORD: RecordLayout<DebugVertex> = {
    byteSize: debugVertexSize,
    write: (view, offset, vertex) => {
        for (let i = 0; i < 3; i++) {
            view.setFloat32(offset + i * 4, vertex.position[i], true);
            view.setFloat32(offset + 12 + i * 4, vertex.color[i], true);
        }
    }
};
