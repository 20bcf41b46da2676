/**
 * Create a GPU buffer that starts out holding `contents`.
 * The buffer is mapped at creation, filled, then unmapped.
 */
export function createBufferInit(
    device: GPUDevice,
    contents: ArrayBuffer | ArrayBufferView,
    usage: GPUBufferUsageFlags,
    label?: string
): GPUBuffer {
    const bytes = ArrayBuffer.isView(contents)
        ? new Uint8Array(contents.buffer, contents.byteOffset, contents.byteLength)
        : new Uint8Array(contents);

    // Mapped ranges must be a multiple of 4 bytes
    const size = Math.max(4, Math.ceil(bytes.byteLength / 4) * 4);

    const buffer = device.createBuffer({
        label,
        size,
        usage,
        mappedAtCreation: true
    });
    new Uint8Array(buffer.getMappedRange()).set(bytes);
    buffer.unmap();

    return buffer;
}
