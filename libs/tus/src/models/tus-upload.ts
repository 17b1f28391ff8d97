import { stat } from 'fs/promises';
import { resolve } from 'path';
import { BufferUploadSource, FileUploadSource, UploadSource } from './upload-source';

/**
 * Describes one logical upload. The fingerprint identifies it across process
 * restarts and must stay stable for resuming to work.
 */
export class TusUpload {
    private metadata: Record<string, string>;

    constructor(
        readonly fingerprint: string,
        readonly size: number,
        readonly source: UploadSource,
        metadata: Record<string, string> = {},
    ) {
        this.metadata = { ...metadata };
    }

    static fromBuffer(buffer: Buffer, fingerprint: string, metadata?: Record<string, string>): TusUpload {
        return new TusUpload(fingerprint, buffer.length, new BufferUploadSource(buffer), metadata);
    }

    /**
     * Fingerprints the file by its absolute path and size.
     */
    static async fromFile(path: string, metadata?: Record<string, string>): Promise<TusUpload> {
        const absolutePath = resolve(path);
        const { size } = await stat(absolutePath);
        return new TusUpload(`${absolutePath}-${size}`, size, new FileUploadSource(absolutePath), metadata);
    }

    getMetadata(): Record<string, string> {
        return { ...this.metadata };
    }

    setMetadata(metadata: Record<string, string>): void {
        this.metadata = { ...metadata };
    }

    /**
     * Value of the `Upload-Metadata` header: `key base64(value)` pairs joined
     * by commas, or an empty string without metadata.
     */
    get encodedMetadata(): string {
        return Object.entries(this.metadata)
            .map(([key, value]) => `${key} ${Buffer.from(value, 'utf8').toString('base64')}`)
            .join(',');
    }
}
