import { createBufferInit } from "./bufferInit";

/**
 * Byte layout of one record stored in a StagedBuffer.
 * `byteSize` must be a multiple of 4 so copies stay aligned.
 */
export interface RecordLayout<T> {
    readonly byteSize: number;
    write(view: DataView, offset: number, record: T): void;
}

export const U32_RECORD: RecordLayout<number> = {
    byteSize: 4,
    write: (view, offset, value) => view.setUint32(offset, value, true)
};

/**
 * WriteBatch - one append transaction on a StagedBuffer
 *
 * Records pushed here reach the host sequence right away but only reach
 * the GPU when the batch closes.
 */
export class WriteBatch<T> {
    readonly start: number;
    private closed: boolean = false;

    constructor(
        start: number,
        private readonly append: (record: T) => void,
        private readonly finish: () => void
    ) {
        this.start = start;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    push(record: T): this {
        if (this.closed) {
            throw new Error("Cannot push to a closed write batch");
        }
        this.append(record);
        return this;
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.finish();
    }
}

/**
 * StagedBuffer - host-side record list mirrored into a growable GPU buffer
 *
 * Usage:
 *   const indices = StagedBuffer.withCapacity(device, U32_RECORD, 64, GPUBufferUsage.INDEX);
 *   indices.write(device, queue, (batch) => batch.push(0).push(1));
 *
 * After every closed batch, GPU bytes [0, byteLength) equal the serialized
 * host records. Capacity only grows.
 */
export default class StagedBuffer<T> {
    readonly layout: RecordLayout<T>;
    readonly usage: GPUBufferUsageFlags;
    readonly label: string | undefined;

    private buffer: GPUBuffer;
    private capacity: number;
    private readonly items: T[] = [];
    private openBatch: WriteBatch<T> | null = null;

    private constructor(
        buffer: GPUBuffer,
        capacity: number,
        layout: RecordLayout<T>,
        usage: GPUBufferUsageFlags,
        label: string | undefined
    ) {
        this.buffer = buffer;
        this.capacity = capacity;
        this.layout = layout;
        this.usage = usage;
        this.label = label;
    }

    static withCapacity<T>(
        device: GPUDevice,
        layout: RecordLayout<T>,
        initialCount: number,
        usage: GPUBufferUsageFlags,
        label?: string
    ): StagedBuffer<T> {
        const capacity = initialCount * layout.byteSize;
        const buffer = device.createBuffer({
            label,
            size: capacity,
            usage: usage | GPUBufferUsage.COPY_DST
        });
        return new StagedBuffer(buffer, capacity, layout, usage | GPUBufferUsage.COPY_DST, label);
    }

    get gpuBuffer(): GPUBuffer {
        return this.buffer;
    }

    get length(): number {
        return this.items.length;
    }

    get byteLength(): number {
        return this.items.length * this.layout.byteSize;
    }

    get byteCapacity(): number {
        return this.capacity;
    }

    get records(): ReadonlyArray<T> {
        return this.items;
    }

    get isBatchOpen(): boolean {
        return this.openBatch !== null;
    }

    /**
     * Drop all host records. The GPU allocation keeps its size.
     */
    clear(): void {
        if (this.openBatch) {
            throw new Error(`${this.describe()}: cannot clear while a write batch is open`);
        }
        this.items.length = 0;
    }

    batch(device: GPUDevice, queue: GPUQueue): WriteBatch<T> {
        if (this.openBatch) {
            throw new Error(`${this.describe()}: a write batch is already open`);
        }

        const start = this.items.length;
        const batch = new WriteBatch<T>(
            start,
            (record) => { this.items.push(record); },
            () => {
                this.openBatch = null;
                this.flush(device, queue, start);
            }
        );
        this.openBatch = batch;
        return batch;
    }

    /**
     * Run `fn` inside a batch that is closed however `fn` exits.
     */
    write<R>(device: GPUDevice, queue: GPUQueue, fn: (batch: WriteBatch<T>) => R): R {
        const batch = this.batch(device, queue);
        try {
            return fn(batch);
        } finally {
            batch.close();
        }
    }

    destroy(): void {
        this.buffer.destroy();
    }

    private flush(device: GPUDevice, queue: GPUQueue, start: number): void {
        const length = this.items.length;
        if (length === 0) return;

        const needed = length * this.layout.byteSize;
        if (needed > this.capacity) {
            const grown = createBufferInit(device, this.serialize(0, length), this.usage, this.label);
            this.buffer.destroy();
            this.buffer = grown;
            this.capacity = needed;
        } else if (length > start) {
            queue.writeBuffer(this.buffer, start * this.layout.byteSize, this.serialize(start, length));
        }
    }

    private serialize(from: number, to: number): ArrayBuffer {
        const size = this.layout.byteSize;
        const bytes = new ArrayBuffer((to - from) * size);
        const view = new DataView(bytes);
        for (let i = from; i < to; i++) {
            this.layout.write(view, (i - from) * size, this.items[i]);
        }
        return bytes;
    }

    private describe(): string {
        return `StagedBuffer(${this.label ?? "unnamed"})`;
    }
}
