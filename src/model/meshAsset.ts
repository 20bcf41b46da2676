import { Accessor, type Document, type Primitive, WebIO } from "@gltf-transform/core";
import type { IndexFormat } from "./definitions";

export class MeshAssetError extends Error {
    readonly asset: string;

    constructor(asset: string, reason: string) {
        super(`${asset}: ${reason}`);
        this.name = "MeshAssetError";
        this.asset = asset;
    }
}

export interface MorphTargetData {
    positions: Float32Array; // vec3 deltas
    normals: Float32Array;   // vec3 deltas
}

/**
 * Host-side arrays of a single-primitive glTF mesh
 */
export interface MeshAsset {
    name: string;
    positions: Float32Array;
    normals: Float32Array;
    texCoords: Float32Array;
    indices: Uint16Array | Uint32Array;
    indexFormat: IndexFormat;
    vertexCount: number;
    morphTargets: [MorphTargetData, MorphTargetData] | null;
}

/**
 * Load a .glb / .gltf from a URL
 */
export async function loadMeshAsset(url: string): Promise<MeshAsset> {
    const io = new WebIO();
    const document = await io.read(url);
    const asset = readMeshAsset(document, url);
    console.log(
        `🧶 Mesh loaded from ${url}: ${asset.vertexCount} vertices, ` +
        `${asset.indices.length} indices (${asset.indexFormat}), ` +
        `${asset.morphTargets ? 2 : 0} morph targets`
    );
    return asset;
}

/**
 * Read GLB bytes already in memory
 */
export async function parseMeshAsset(bytes: Uint8Array, name: string = "<binary>"): Promise<MeshAsset> {
    const io = new WebIO();
    const document = await io.readBinary(bytes);
    return readMeshAsset(document, name);
}

export function readMeshAsset(document: Document, name: string = "<document>"): MeshAsset {
    const meshes = document.getRoot().listMeshes();
    if (meshes.length !== 1) {
        throw new MeshAssetError(name, `expected exactly 1 mesh, found ${meshes.length}`);
    }

    const primitives = meshes[0].listPrimitives();
    if (primitives.length !== 1) {
        throw new MeshAssetError(name, `expected exactly 1 primitive, found ${primitives.length}`);
    }
    const primitive = primitives[0];

    const position = requireAttribute(primitive, "POSITION", name);
    const normal = requireAttribute(primitive, "NORMAL", name);
    const texCoord = requireAttribute(primitive, "TEXCOORD_0", name);

    const vertexCount = Math.min(position.getCount(), normal.getCount());
    if (texCoord.getCount() < vertexCount) {
        throw new MeshAssetError(
            name,
            `TEXCOORD_0 has ${texCoord.getCount()} elements, fewer than ${vertexCount} vertices`
        );
    }

    const { indices, indexFormat } = readIndices(primitive, name);

    return {
        name,
        positions: readElements(position, vertexCount, 3),
        normals: readElements(normal, vertexCount, 3),
        texCoords: readElements(texCoord, vertexCount, 2),
        indices,
        indexFormat,
        vertexCount,
        morphTargets: readMorphTargets(primitive, vertexCount, name)
    };
}

function requireAttribute(primitive: Primitive, semantic: string, name: string): Accessor {
    const accessor = primitive.getAttribute(semantic);
    if (!accessor) {
        throw new MeshAssetError(name, `primitive has no ${semantic} attribute`);
    }
    return accessor;
}

function readIndices(
    primitive: Primitive,
    name: string
): { indices: Uint16Array | Uint32Array; indexFormat: IndexFormat } {
    const accessor = primitive.getIndices();
    if (!accessor) {
        throw new MeshAssetError(name, "primitive has no indices");
    }

    const count = accessor.getCount();
    let indices: Uint16Array | Uint32Array;
    let indexFormat: IndexFormat;
    switch (accessor.getComponentType()) {
        case Accessor.ComponentType.UNSIGNED_SHORT:
            indices = new Uint16Array(count);
            indexFormat = "uint16";
            break;
        case Accessor.ComponentType.UNSIGNED_INT:
            indices = new Uint32Array(count);
            indexFormat = "uint32";
            break;
        default:
            throw new MeshAssetError(name, `unsupported index component type ${accessor.getComponentType()}`);
    }

    for (let i = 0; i < count; i++) {
        indices[i] = accessor.getScalar(i);
    }
    return { indices, indexFormat };
}

// Copies the first `count` elements as tightly packed floats
function readElements(accessor: Accessor, count: number, size: number): Float32Array {
    const out = new Float32Array(count * size);
    const element: number[] = new Array<number>(accessor.getElementSize()).fill(0);
    for (let i = 0; i < count; i++) {
        accessor.getElement(i, element);
        for (let c = 0; c < size; c++) {
            out[i * size + c] = element[c] ?? 0;
        }
    }
    return out;
}

function readMorphTargets(
    primitive: Primitive,
    vertexCount: number,
    name: string
): [MorphTargetData, MorphTargetData] | null {
    const targets = primitive.listTargets();
    if (targets.length === 0) return null;

    if (targets.length === 1) {
        console.warn(`⚠️ ${name}: a single morph target is ignored, two are required`);
        return null;
    }
    if (targets.length > 2) {
        console.warn(`⚠️ ${name}: ${targets.length} morph targets found, using the first two`);
    }

    const accessors = targets.slice(0, 2).map((target, index) => {
        const positions = target.getAttribute("POSITION");
        const normals = target.getAttribute("NORMAL");
        if (!positions || !normals) {
            throw new MeshAssetError(name, `morph target ${index} needs both POSITION and NORMAL`);
        }
        return { positions, normals };
    });

    const length = accessors.reduce(
        (min, { positions, normals }) => Math.min(min, positions.getCount(), normals.getCount()),
        vertexCount
    );

    const [first, second] = accessors.map(({ positions, normals }) => ({
        positions: readElements(positions, length, 3),
        normals: readElements(normals, length, 3)
    }));
    return [first, second];
}
