import { describe, it, expect } from "vitest";
import { ProcessorError } from "../../src/lib/errors";
import {
  createModelProcessor,
  estimateLodLevels,
  gltfToGlb,
  isGlb,
  modelInfo,
  readGlb,
  type ModelInfo,
} from "../../src/processors/model";
import { createTriangleGltf } from "../fixtures";

const model = createModelProcessor();
const encode = { op: "encode", format: "glb" } as const;

describe("model processor", () => {
  it("packs a glTF with an embedded buffer into a GLB", async () => {
    const gltf = Buffer.from(JSON.stringify(createTriangleGltf()));
    const glb = await model.transform(gltf, encode);

    expect(isGlb(glb)).toBe(true);
    expect(glb.readUInt32LE(8)).toBe(glb.length);
    const { json, bin } = readGlb(glb);
    expect(json.buffers).toEqual([{ byteLength: 44 }]);
    expect(json.bufferViews).toEqual([
      { buffer: 0, byteOffset: 0, byteLength: 36 },
      { buffer: 0, byteOffset: 36, byteLength: 6 },
    ]);
    expect(bin?.length).toBe(44);
    expect(bin?.readFloatLE(12)).toBe(1);
  });

  it("passes a valid GLB through unchanged", async () => {
    const glb = gltfToGlb(createTriangleGltf());
    expect(await model.transform(glb, encode)).toBe(glb);
  });

  it("rejects a GLB whose length field is wrong", async () => {
    const glb = Buffer.from(gltfToGlb(createTriangleGltf()));
    glb.writeUInt32LE(glb.length + 4, 8);
    await expect(model.transform(glb, encode)).rejects.toThrow("length field");
  });

  it("rejects external buffer references", async () => {
    const doc = { ...createTriangleGltf(), buffers: [{ byteLength: 44, uri: "triangle.bin" }] };
    await expect(model.transform(Buffer.from(JSON.stringify(doc)), encode)).rejects.toThrow(
      'references external file "triangle.bin"'
    );
  });

  it("rejects JSON that is not glTF", async () => {
    await expect(model.transform(Buffer.from('{"hello":1}'), encode)).rejects.toThrow(ProcessorError);
  });

  it("reports missing mesh codecs", async () => {
    const gltf = Buffer.from(JSON.stringify(createTriangleGltf()));
    await expect(model.transform(gltf, { op: "bufferCompress", method: "draco" })).rejects.toThrow(
      "draco compression needs an external mesh codec"
    );
    await expect(model.transform(gltf, { op: "simplify", ratio: 0.5, levels: 3 })).rejects.toThrow(ProcessorError);
  });
});

describe("modelInfo", () => {
  it("counts geometry in glTF and GLB alike", () => {
    const expected = {
      meshes: 1,
      primitives: 1,
      vertices: 3,
      indices: 3,
      triangles: 1,
      materials: 0,
      textures: 0,
      animations: 0,
      nodes: 1,
    };
    expect(modelInfo(Buffer.from(JSON.stringify(createTriangleGltf())))).toEqual({
      container: "gltf",
      ...expected,
      binaryBytes: 42,
    });
    // The BIN chunk is padded to four bytes
    expect(modelInfo(gltfToGlb(createTriangleGltf()))).toEqual({
      container: "glb",
      ...expected,
      binaryBytes: 44,
    });
  });
});

describe("estimateLodLevels", () => {
  const base: ModelInfo = {
    container: "glb",
    meshes: 1,
    primitives: 1,
    vertices: 0,
    indices: 0,
    triangles: 9000,
    materials: 0,
    textures: 0,
    animations: 0,
    nodes: 1,
    binaryBytes: 0,
  };

  it("suggests only the full mesh for small models", () => {
    expect(estimateLodLevels({ ...base, vertices: 1000 })).toEqual([
      { level: 0, vertexRatio: 1, distance: 0, triangles: 9000 },
    ]);
  });

  it("adds a level for every vertex tier exceeded", () => {
    expect(estimateLodLevels({ ...base, vertices: 10001 })).toEqual([
      { level: 0, vertexRatio: 1, distance: 0, triangles: 9000 },
      { level: 1, vertexRatio: 0.5, distance: 10, triangles: 4500 },
      { level: 2, vertexRatio: 0.25, distance: 25, triangles: 2250 },
      { level: 3, vertexRatio: 0.1, distance: 50, triangles: 900 },
    ]);
    expect(estimateLodLevels({ ...base, vertices: 5000 })).toHaveLength(2);
  });
});
