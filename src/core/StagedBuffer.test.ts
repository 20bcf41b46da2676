import { beforeEach, describe, expect, it } from "vitest";
import StagedBuffer, { U32_RECORD } from "./StagedBuffer";
import { FakeBuffer, FakeDevice } from "../../test/fakeGpu";

function u32s(buffer: FakeBuffer, count: number): number[] {
    return Array.from(new Uint32Array(buffer.bytes.buffer, 0, count));
}

function current(staged: StagedBuffer<number>): FakeBuffer {
    const buffer = staged.gpuBuffer;
    if (!(buffer instanceof FakeBuffer)) {
        throw new Error("expected a fake buffer");
    }
    return buffer;
}

describe("StagedBuffer", () => {
    let fake: FakeDevice;

    beforeEach(() => {
        fake = new FakeDevice();
    });

    it("allocates initial capacity with COPY_DST added", () => {
        const staged = StagedBuffer.withCapacity(fake.device, U32_RECORD, 4, GPUBufferUsage.INDEX, "indices");

        expect(staged.byteCapacity).toBe(16);
        expect(staged.length).toBe(0);
        expect(fake.buffers).toHaveLength(1);
        expect(fake.buffers[0].size).toBe(16);
        expect(fake.buffers[0].usage).toBe(GPUBufferUsage.INDEX | GPUBufferUsage.COPY_DST);
    });

    it("grows into an exact-size buffer holding the whole sequence", () => {
        const staged = StagedBuffer.withCapacity(fake.device, U32_RECORD, 2, GPUBufferUsage.INDEX);
        const original = current(staged);

        staged.write(fake.device, fake.queue.queue, (batch) => {
            batch.push(1).push(2).push(3);
        });

        const grown = current(staged);
        expect(grown).not.toBe(original);
        expect(original.destroyed).toBe(true);
        expect(fake.buffers).toHaveLength(2);
        expect(grown.size).toBe(12);
        expect(grown.mapped).toBe(false);
        expect(staged.byteCapacity).toBe(12);
        expect(u32s(grown, 3)).toEqual([1, 2, 3]);
        expect(fake.queue.writes).toHaveLength(0);
    });

    it("writes only the appended range when capacity suffices", () => {
        const staged = StagedBuffer.withCapacity(fake.device, U32_RECORD, 8, GPUBufferUsage.VERTEX);

        staged.write(fake.device, fake.queue.queue, (batch) => {
            batch.push(10).push(11);
        });
        staged.write(fake.device, fake.queue.queue, (batch) => {
            batch.push(12);
        });

        expect(fake.queue.writes).toHaveLength(2);
        expect(fake.queue.writes[1].offset).toBe(8);
        expect(Array.from(new Uint32Array(fake.queue.writes[1].bytes.buffer))).toEqual([12]);
        expect(u32s(current(staged), 3)).toEqual([10, 11, 12]);
        expect(fake.buffers).toHaveLength(1);
    });

    it("transfers nothing for an empty sequence", () => {
        const staged = StagedBuffer.withCapacity(fake.device, U32_RECORD, 0, GPUBufferUsage.INDEX);

        staged.batch(fake.device, fake.queue.queue).close();

        expect(fake.queue.writes).toHaveLength(0);
        expect(fake.buffers).toHaveLength(1);
        expect(staged.byteCapacity).toBe(0);
    });

    it("transfers nothing when a batch pushes no records", () => {
        const staged = StagedBuffer.withCapacity(fake.device, U32_RECORD, 4, GPUBufferUsage.INDEX);
        staged.write(fake.device, fake.queue.queue, (batch) => { batch.push(7); });

        staged.batch(fake.device, fake.queue.queue).close();

        expect(fake.queue.writes).toHaveLength(1);
    });

    it("keeps capacity after clear and rewrites from offset zero", () => {
        const staged = StagedBuffer.withCapacity(fake.device, U32_RECORD, 1, GPUBufferUsage.INDEX);
        staged.write(fake.device, fake.queue.queue, (batch) => { batch.push(1).push(2); });

        staged.clear();
        staged.write(fake.device, fake.queue.queue, (batch) => { batch.push(9); });

        expect(staged.length).toBe(1);
        expect(staged.byteCapacity).toBe(8);
        expect(fake.queue.writes).toHaveLength(1);
        expect(fake.queue.writes[0].offset).toBe(0);
        expect(u32s(current(staged), 2)).toEqual([9, 2]);
    });

    it("refuses a second batch while one is open", () => {
        const staged = StagedBuffer.withCapacity(fake.device, U32_RECORD, 4, GPUBufferUsage.INDEX);
        const first = staged.batch(fake.device, fake.queue.queue);

        expect(staged.isBatchOpen).toBe(true);
        expect(() => staged.batch(fake.device, fake.queue.queue)).toThrow(/already open/);

        first.close();
        expect(staged.isBatchOpen).toBe(false);
        expect(() => staged.batch(fake.device, fake.queue.queue).close()).not.toThrow();
    });

    it("closes the scoped batch when the callback throws", () => {
        const staged = StagedBuffer.withCapacity(fake.device, U32_RECORD, 4, GPUBufferUsage.INDEX);

        expect(() => staged.write(fake.device, fake.queue.queue, (batch) => {
            batch.push(5);
            throw new Error("boom");
        })).toThrow("boom");

        expect(staged.isBatchOpen).toBe(false);
        expect(u32s(current(staged), 1)).toEqual([5]);
    });

    it("ignores a second close and rejects pushes after close", () => {
        const staged = StagedBuffer.withCapacity(fake.device, U32_RECORD, 4, GPUBufferUsage.INDEX);
        const batch = staged.batch(fake.device, fake.queue.queue);
        batch.push(3);

        batch.close();
        batch.close();

        expect(fake.queue.writes).toHaveLength(1);
        expect(batch.isClosed).toBe(true);
        expect(() => batch.push(4)).toThrow(/closed/);
    });

    it("returns the callback result from write", () => {
        const staged = StagedBuffer.withCapacity(fake.device, U32_RECORD, 4, GPUBufferUsage.INDEX);

        const start = staged.write(fake.device, fake.queue.queue, (batch) => batch.start);

        expect(start).toBe(0);
    });
});
