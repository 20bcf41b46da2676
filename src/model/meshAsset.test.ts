import { readFile } from "node:fs/promises";
import { afterEach, describe, expect, it, vi } from "vitest";
import { Accessor, Document, type Primitive } from "@gltf-transform/core";
import { MeshAssetError, parseMeshAsset, readMeshAsset } from "./meshAsset";

interface PrimitiveOptions {
    positions?: number[];
    normals?: number[];
    texCoords?: number[];
    indices?: Uint8Array | Uint16Array | Uint32Array | null;
    targets?: number;
    targetNormals?: boolean;
}

const QUAD_POSITIONS = [0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 0];
const QUAD_NORMALS = [0, 0, 1, 0, 0, 1, 0, 0, 1, 0, 0, 1];
const QUAD_UVS = [0, 0, 1, 0, 1, 1, 0, 1];

function vec3Accessor(document: Document, values: number[]): Accessor {
    return document.createAccessor().setType("VEC3").setArray(new Float32Array(values));
}

function addPrimitive(document: Document, options: PrimitiveOptions = {}): Primitive {
    const primitive = document.createPrimitive();
    primitive.setAttribute("POSITION", vec3Accessor(document, options.positions ?? QUAD_POSITIONS));
    primitive.setAttribute("NORMAL", vec3Accessor(document, options.normals ?? QUAD_NORMALS));
    primitive.setAttribute(
        "TEXCOORD_0",
        document.createAccessor().setType("VEC2").setArray(new Float32Array(options.texCoords ?? QUAD_UVS))
    );

    const indices = options.indices === undefined ? new Uint16Array([0, 1, 2, 0, 2, 3]) : options.indices;
    if (indices) {
        primitive.setIndices(document.createAccessor().setType("SCALAR").setArray(indices));
    }

    for (let t = 0; t < (options.targets ?? 0); t++) {
        const target = document.createPrimitiveTarget();
        target.setAttribute("POSITION", vec3Accessor(document, QUAD_POSITIONS.map((v) => v * (t + 1))));
        if (options.targetNormals ?? true) {
            target.setAttribute("NORMAL", vec3Accessor(document, QUAD_NORMALS.map((v) => -v * (t + 1))));
        }
        primitive.addTarget(target);
    }
    return primitive;
}

function quadDocument(options: PrimitiveOptions = {}): Document {
    const document = new Document();
    document.createMesh("quad").addPrimitive(addPrimitive(document, options));
    return document;
}

describe("readMeshAsset", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("reads a valid single-primitive quad", () => {
        const asset = readMeshAsset(quadDocument(), "quad.glb");

        expect(asset.vertexCount).toBe(4);
        expect(Array.from(asset.positions)).toEqual(QUAD_POSITIONS);
        expect(Array.from(asset.normals)).toEqual(QUAD_NORMALS);
        expect(Array.from(asset.texCoords)).toEqual(QUAD_UVS);
        expect(asset.indexFormat).toBe("uint16");
        expect(asset.indices).toBeInstanceOf(Uint16Array);
        expect(Array.from(asset.indices)).toEqual([0, 1, 2, 0, 2, 3]);
        expect(asset.morphTargets).toBeNull();
    });

    it("keeps 32-bit indices as uint32", () => {
        const asset = readMeshAsset(quadDocument({ indices: new Uint32Array([0, 1, 2]) }));

        expect(asset.indexFormat).toBe("uint32");
        expect(asset.indices).toBeInstanceOf(Uint32Array);
        expect(Array.from(asset.indices)).toEqual([0, 1, 2]);
    });

    it("uses the smaller of the position and normal counts", () => {
        const asset = readMeshAsset(quadDocument({ normals: QUAD_NORMALS.slice(0, 9) }));

        expect(asset.vertexCount).toBe(3);
        expect(asset.positions).toHaveLength(9);
        expect(asset.texCoords).toHaveLength(6);
    });

    it("rejects a document without meshes", () => {
        expect(() => readMeshAsset(new Document(), "empty.glb")).toThrow(
            new MeshAssetError("empty.glb", "expected exactly 1 mesh, found 0")
        );
    });

    it("rejects a document with two meshes", () => {
        const document = quadDocument();
        document.createMesh("extra").addPrimitive(addPrimitive(document));

        expect(() => readMeshAsset(document)).toThrow(/expected exactly 1 mesh, found 2/);
    });

    it("rejects a mesh with two primitives", () => {
        const document = quadDocument();
        document.getRoot().listMeshes()[0].addPrimitive(addPrimitive(document));

        expect(() => readMeshAsset(document)).toThrow(/expected exactly 1 primitive, found 2/);
    });

    it("rejects a primitive without normals", () => {
        const document = quadDocument();
        document.getRoot().listMeshes()[0].listPrimitives()[0].setAttribute("NORMAL", null);

        expect(() => readMeshAsset(document)).toThrow(/no NORMAL attribute/);
    });

    it("rejects a primitive without indices", () => {
        expect(() => readMeshAsset(quadDocument({ indices: null }))).toThrow(/has no indices/);
    });

    it("rejects 8-bit indices", () => {
        const document = quadDocument({ indices: new Uint8Array([0, 1, 2]) });

        expect(() => readMeshAsset(document)).toThrow(
            `unsupported index component type ${Accessor.ComponentType.UNSIGNED_BYTE}`
        );
    });

    it("rejects texcoords shorter than the vertex count", () => {
        expect(() => readMeshAsset(quadDocument({ texCoords: [0, 0, 1, 0] }))).toThrow(
            /TEXCOORD_0 has 2 elements, fewer than 4 vertices/
        );
    });

    it("reads two morph targets as position and normal deltas", () => {
        const asset = readMeshAsset(quadDocument({ targets: 2 }));

        const targets = asset.morphTargets;
        if (!targets) throw new Error("expected morph targets");
        const [first, second] = targets;
        expect(Array.from(first.positions)).toEqual(QUAD_POSITIONS);
        expect(Array.from(second.positions)).toEqual(QUAD_POSITIONS.map((v) => v * 2));
        expect(Array.from(second.normals)).toEqual(QUAD_NORMALS.map((v) => -v * 2));
    });

    it("ignores a lone morph target with a warning", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

        const asset = readMeshAsset(quadDocument({ targets: 1 }), "one.glb");

        expect(asset.morphTargets).toBeNull();
        expect(warn).toHaveBeenCalledWith("⚠️ one.glb: a single morph target is ignored, two are required");
    });

    it("uses the first two of three morph targets with a warning", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

        const asset = readMeshAsset(quadDocument({ targets: 3 }), "three.glb");

        expect(warn).toHaveBeenCalledWith("⚠️ three.glb: 3 morph targets found, using the first two");
        expect(Array.from(asset.morphTargets?.[1].positions ?? new Float32Array())).toEqual(
            QUAD_POSITIONS.map((v) => v * 2)
        );
    });

    it("rejects a used morph target without normals", () => {
        expect(() => readMeshAsset(quadDocument({ targets: 2, targetNormals: false }))).toThrow(
            /morph target 0 needs both POSITION and NORMAL/
        );
    });
});

describe("parseMeshAsset", () => {
    it("reads the bundled spherical cube from GLB bytes", async () => {
        const url = new URL("../../public/models/spherical-cube.glb", import.meta.url);
        const bytes = new Uint8Array(await readFile(url));

        const asset = await parseMeshAsset(bytes, "spherical-cube.glb");

        // 6 faces of a 16x16 grid
        expect(asset.vertexCount).toBe(6 * 17 * 17);
        expect(asset.indices).toHaveLength(6 * 16 * 16 * 6);
        expect(asset.indexFormat).toBe("uint16");
        expect(asset.morphTargets).toBeNull();
        expect(asset.name).toBe("spherical-cube.glb");
    });
});
