import { open, FileHandle } from 'fs/promises';

/**
 * Random access to the bytes of an upload. `read` returns fewer bytes than
 * requested only at the end of the data.
 */
export interface UploadSource {
    read(offset: number, length: number): Promise<Buffer>;
    close(): Promise<void>;
}

export class BufferUploadSource implements UploadSource {
    constructor(private readonly buffer: Buffer) { }

    async read(offset: number, length: number): Promise<Buffer> {
        return this.buffer.subarray(offset, offset + length);
    }

    async close(): Promise<void> { }
}

export class FileUploadSource implements UploadSource {
    private handle?: FileHandle;

    constructor(private readonly path: string) { }

    async read(offset: number, length: number): Promise<Buffer> {
        this.handle ??= await open(this.path, 'r');

        const chunk = Buffer.alloc(length);
        const { bytesRead } = await this.handle.read(chunk, 0, length, offset);
        return chunk.subarray(0, bytesRead);
    }

    async close(): Promise<void> {
        if (this.handle) {
            await this.handle.close();
            this.handle = undefined;
        }
    }
}
