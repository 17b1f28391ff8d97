import { Logger } from '@nestjs/common';
import { TusClient } from './tus-client.service';
import { TusUpload } from '../models/tus-upload';
import { UploadSource } from '../models/upload-source';
import { TusError, TusProtocolError } from '../errors/tus.errors';
import { getHeader, isSuccessStatus } from '../transport/response-headers';
import { OFFSET_OCTET_STREAM, TusHeader } from '../tus-header.enum';

/**
 * Transfers the bytes of an upload with PATCH requests, one chunk at a time,
 * starting from the offset the client resolved. Failed requests are not
 * retried.
 */
export class TusUploader {
    private readonly logger = new Logger(TusUploader.name);
    private chunkSize: number;
    private currentOffset: number;

    constructor(
        private readonly client: TusClient,
        private readonly tusUpload: TusUpload,
        readonly uploadUrl: URL,
        private readonly source: UploadSource,
        offset: number,
    ) {
        this.currentOffset = offset;
        this.chunkSize = client.getChunkSize();
    }

    get offset(): number {
        return this.currentOffset;
    }

    getChunkSize(): number {
        return this.chunkSize;
    }

    setChunkSize(size: number): void {
        if (!Number.isInteger(size) || size <= 0) {
            throw new RangeError(`chunk size must be a positive integer, got ${size}`);
        }
        this.chunkSize = size;
    }

    /**
     * Upload the next chunk.
     * @returns Number of bytes sent, 0 once the whole upload is sent
     * @throws TusError if the source ends before the upload size
     * @throws TusProtocolError if the server rejects the chunk or reports another offset
     */
    async uploadChunk(): Promise<number> {
        const length = Math.min(this.chunkSize, this.tusUpload.size - this.currentOffset);
        if (length <= 0) {
            return 0;
        }

        const chunk = await this.source.read(this.currentOffset, length);
        if (chunk.length === 0) {
            throw new TusError(`source ended at offset ${this.currentOffset} before upload size ${this.tusUpload.size}`);
        }

        const response = await this.client.sendRequest(
            this.tusUpload.fingerprint,
            'PATCH',
            this.uploadUrl,
            {
                [TusHeader.UPLOAD_OFFSET]: String(this.currentOffset),
                [TusHeader.CONTENT_TYPE]: OFFSET_OCTET_STREAM,
            },
            chunk,
        );
        await this.client.updateCookies(this.tusUpload.fingerprint, response);

        if (!isSuccessStatus(response.status)) {
            throw new TusProtocolError(
                `unexpected status code (${response.status}) while uploading chunk`,
                response,
            );
        }

        const expectedOffset = this.currentOffset + chunk.length;
        const serverOffset = getHeader(response, TusHeader.UPLOAD_OFFSET);
        if (serverOffset === undefined || Number(serverOffset) !== expectedOffset) {
            throw new TusProtocolError(
                `response to PATCH request contains different Upload-Offset value (${serverOffset}) than expected (${expectedOffset})`,
                response,
            );
        }

        this.currentOffset = expectedOffset;
        this.logger.debug(`Uploaded ${chunk.length} bytes to ${this.uploadUrl.href}, offset ${this.currentOffset}/${this.tusUpload.size}`);

        return chunk.length;
    }

    /**
     * Release the source. Once every byte is on the server the client is
     * told the upload finished.
     */
    async finish(): Promise<void> {
        await this.source.close();

        if (this.currentOffset === this.tusUpload.size) {
            await this.client.uploadFinished(this.tusUpload);
        }
    }

    /**
     * Upload the remaining chunks and finish.
     * @returns The upload URL
     */
    async upload(): Promise<URL> {
        try {
            let sent: number;
            do {
                sent = await this.uploadChunk();
            } while (sent > 0);
        } finally {
            await this.finish();
        }

        return this.uploadUrl;
    }
}
