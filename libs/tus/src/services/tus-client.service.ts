import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import tusConfig, { TusConfig } from '../tus.config';
import { HttpMethod, HttpTransport, TransportResponse } from '../interfaces/http-transport.interface';
import { TusUrlStore } from '../interfaces/tus-url-store.interface';
import { TusUpload } from '../models/tus-upload';
import { UrlDetail } from '../models/url-detail';
import { parseSetCookie, serializeCookieHeader } from '../cookies/cookie-codec';
import { getHeader, getHeaderValues, isSuccessStatus } from '../transport/response-headers';
import {
    FingerprintNotFoundError,
    ResumingNotEnabledError,
    TusConfigurationError,
    TusProtocolError,
} from '../errors/tus.errors';
import { settleResume, shouldCreateAfterResume } from './resume-outcome';
import { TusUploader } from './tus-uploader';
import { TusHeader } from '../tus-header.enum';
import {
    TUS_HTTP_TRANSPORT,
    TUS_URL_STORE,
    TUS_VERSION,
} from '../tus.constants';

const OFFSET_PATTERN = /^\d+$/;

/**
 * Creates new uploads or resumes existing ones. The returned {@link TusUploader}
 * transfers the actual bytes.
 *
 * @example
 * ```typescript
 * const upload = await TusUpload.fromFile('./video.mp4', { filename: 'video.mp4' });
 * const uploader = await tusClient.resumeOrCreateUpload(upload);
 * const url = await uploader.upload();
 * ```
 */
@Injectable()
export class TusClient {
    private readonly logger = new Logger(TusClient.name);

    private uploadCreationUrl?: URL;
    private urlStore?: TusUrlStore;
    private cookiesEnabled: boolean;
    private removeFingerprintOnSuccess: boolean;
    private headers: Record<string, string> = {};
    private connectTimeout: number;
    private readonly chunkSize: number;

    constructor(
        @Inject(tusConfig.KEY) config: TusConfig,
        @Inject(TUS_HTTP_TRANSPORT) private readonly transport: HttpTransport,
        @Optional() @Inject(TUS_URL_STORE) urlStore?: TusUrlStore,
    ) {
        if (config.uploadCreationUrl) {
            this.uploadCreationUrl = new URL(config.uploadCreationUrl);
        }
        if (urlStore && config.resumingEnabled) {
            this.urlStore = urlStore;
        }
        this.cookiesEnabled = config.cookiesEnabled;
        this.removeFingerprintOnSuccess = config.removeFingerprintOnSuccess;
        this.connectTimeout = config.connectTimeout;
        this.chunkSize = config.chunkSize;
    }

    /**
     * Set the URL used for creating new uploads. Only needed by
     * {@link createUpload} and {@link resumeOrCreateUpload}.
     * @param url - Absolute upload creation URL
     */
    setUploadCreationUrl(url: URL | string): void {
        this.uploadCreationUrl = new URL(url);
    }

    getUploadCreationUrl(): URL | undefined {
        return this.uploadCreationUrl;
    }

    /**
     * Enable resuming, storing upload URLs in the given store.
     */
    enableResuming(urlStore: TusUrlStore): void {
        this.urlStore = urlStore;
    }

    disableResuming(): void {
        this.urlStore = undefined;
    }

    isResumingEnabled(): boolean {
        return this.urlStore !== undefined;
    }

    /**
     * Capture cookies from responses and send them back on later requests for
     * the same upload. Only takes effect while resuming is enabled, since the
     * cookies live in the URL store.
     */
    enableCookies(): void {
        this.cookiesEnabled = true;
    }

    disableCookies(): void {
        this.cookiesEnabled = false;
    }

    isCookiesEnabled(): boolean {
        return this.cookiesEnabled;
    }

    enableRemoveFingerprintOnSuccess(): void {
        this.removeFingerprintOnSuccess = true;
    }

    disableRemoveFingerprintOnSuccess(): void {
        this.removeFingerprintOnSuccess = false;
    }

    isRemoveFingerprintOnSuccessEnabled(): boolean {
        return this.removeFingerprintOnSuccess;
    }

    /**
     * Set headers added to every request made by this client. They are
     * applied after `Tus-Resumable` and may override tus headers, which can
     * break the protocol.
     */
    setHeaders(headers: Record<string, string> | undefined): void {
        this.headers = { ...headers };
    }

    getHeaders(): Record<string, string> {
        return { ...this.headers };
    }

    /**
     * @param timeout - Timeout in milliseconds
     */
    setConnectTimeout(timeout: number): void {
        this.connectTimeout = timeout;
    }

    getConnectTimeout(): number {
        return this.connectTimeout;
    }

    getChunkSize(): number {
        return this.chunkSize;
    }

    /**
     * Create a new upload with a POST request to the upload creation URL.
     * @param upload - The upload to create
     * @returns Uploader starting at offset 0
     * @throws TusConfigurationError if no upload creation URL is set
     * @throws TusProtocolError if the server sent an unexpected status or no valid Location
     */
    async createUpload(upload: TusUpload): Promise<TusUploader> {
        if (!this.uploadCreationUrl) {
            throw new TusConfigurationError('no upload creation URL set, use setUploadCreationUrl() to do so');
        }

        const headers: Record<string, string> = {};
        if (upload.encodedMetadata.length > 0) {
            headers[TusHeader.UPLOAD_METADATA] = upload.encodedMetadata;
        }
        headers[TusHeader.UPLOAD_LENGTH] = String(upload.size);

        const response = await this.sendRequest(upload.fingerprint, 'POST', this.uploadCreationUrl, headers);

        if (!isSuccessStatus(response.status)) {
            throw new TusProtocolError(
                `unexpected status code (${response.status}) while creating upload`,
                response,
            );
        }

        const location = getHeader(response, TusHeader.LOCATION);
        if (!location) {
            throw new TusProtocolError('missing upload URL in response for creating upload', response);
        }

        // Relative to the URL the response came from, which is not the
        // creation URL when the POST was redirected.
        let uploadUrl: URL;
        try {
            uploadUrl = new URL(location, response.url);
        } catch {
            throw new TusProtocolError(`invalid upload URL (${location}) in response for creating upload`, response);
        }

        await this.storeUrlDetail(upload.fingerprint, uploadUrl, response);
        this.logger.debug(`Created upload ${uploadUrl.href} for ${upload.fingerprint}`);

        return new TusUploader(this, upload, uploadUrl, upload.source, 0);
    }

    /**
     * Resume an upload whose URL is recorded in the URL store under the
     * upload's fingerprint. A HEAD request fetches the current offset.
     * @throws ResumingNotEnabledError if no URL store is configured
     * @throws FingerprintNotFoundError if the store has no entry for the upload
     * @throws TusProtocolError if the server sent an unexpected response
     */
    async resumeUpload(upload: TusUpload): Promise<TusUploader> {
        if (!this.urlStore) {
            throw new ResumingNotEnabledError();
        }

        const urlDetail = await this.urlStore.get(upload.fingerprint);
        if (!urlDetail) {
            throw new FingerprintNotFoundError(upload.fingerprint);
        }

        return this.beginOrResumeUploadFromUrl(upload, urlDetail.url);
    }

    /**
     * Begin or resume an upload at a URL obtained elsewhere, for services that
     * create the tus upload on the caller's behalf. No creation URL is needed.
     * @param upload - The upload to transfer
     * @param uploadUrl - Location of the already created upload
     * @throws TusProtocolError if the server sent an unexpected status or no valid Upload-Offset
     */
    async beginOrResumeUploadFromUrl(upload: TusUpload, uploadUrl: URL): Promise<TusUploader> {
        const response = await this.sendRequest(upload.fingerprint, 'HEAD', uploadUrl);

        if (!isSuccessStatus(response.status)) {
            throw new TusProtocolError(
                `unexpected status code (${response.status}) while resuming upload`,
                response,
            );
        }

        const offsetHeader = getHeader(response, TusHeader.UPLOAD_OFFSET);
        if (!offsetHeader) {
            throw new TusProtocolError('missing upload offset in response for resuming upload', response);
        }
        const offset = Number(offsetHeader);
        if (!OFFSET_PATTERN.test(offsetHeader) || !Number.isSafeInteger(offset)) {
            throw new TusProtocolError(`invalid upload offset (${offsetHeader}) in response for resuming upload`, response);
        }

        await this.storeUrlDetail(upload.fingerprint, uploadUrl, response);
        this.logger.debug(`Resuming upload ${uploadUrl.href} at offset ${offset}`);

        return new TusUploader(this, upload, uploadUrl, upload.source, offset);
    }

    /**
     * Resume the upload, or create a new one when there is nothing to resume:
     * resuming is disabled, the fingerprint is unknown or the server answered
     * the resume request with 404. Any other failure is rethrown.
     */
    async resumeOrCreateUpload(upload: TusUpload): Promise<TusUploader> {
        const outcome = await settleResume(() => this.resumeUpload(upload));
        if (outcome.kind === 'resumed') {
            return outcome.value;
        }

        if (!shouldCreateAfterResume(outcome)) {
            throw outcome.error;
        }

        if (outcome.kind === 'protocol-error') {
            this.logger.warn(`Upload for ${upload.fingerprint} is gone on the server, creating a new one`);
        }
        return this.createUpload(upload);
    }

    /**
     * Headers for every request about an upload: `Tus-Resumable`, the custom
     * headers and, with cookies and resuming enabled, the stored cookies.
     */
    async prepareHeaders(fingerprint: string): Promise<Record<string, string>> {
        const headers: Record<string, string> = {
            [TusHeader.TUS_RESUMABLE]: TUS_VERSION,
            ...this.headers,
        };

        if (this.cookiesEnabled && this.urlStore) {
            const urlDetail = await this.urlStore.get(fingerprint);
            const cookie = urlDetail && serializeCookieHeader(urlDetail.cookies);
            if (cookie) {
                headers[TusHeader.COOKIE] = cookie;
            }
        }

        return headers;
    }

    /**
     * Send a request about an upload with the prepared headers followed by
     * `headers`.
     */
    async sendRequest(
        fingerprint: string,
        method: HttpMethod,
        url: URL,
        headers: Record<string, string> = {},
        body?: Buffer,
    ): Promise<TransportResponse> {
        return this.transport.send({
            method,
            url,
            headers: { ...(await this.prepareHeaders(fingerprint)), ...headers },
            body,
            timeout: this.connectTimeout,
        });
    }

    /**
     * Merge cookies set by the response into the stored entry of the upload.
     */
    async updateCookies(fingerprint: string, response: TransportResponse): Promise<void> {
        if (!this.urlStore || !this.cookiesEnabled) {
            return;
        }

        const cookies = parseSetCookie(getHeaderValues(response, TusHeader.SET_COOKIE));
        if (cookies.length > 0) {
            await this.urlStore.updateCookies(fingerprint, cookies);
        }
    }

    /**
     * Called by the uploader once all bytes are transferred. Drops the
     * upload's entry if removing fingerprints on success is enabled.
     */
    async uploadFinished(upload: TusUpload): Promise<void> {
        if (this.urlStore && this.removeFingerprintOnSuccess) {
            await this.urlStore.remove(upload.fingerprint);
        }
    }

    private async storeUrlDetail(fingerprint: string, uploadUrl: URL, response: TransportResponse): Promise<void> {
        if (!this.urlStore) {
            return;
        }

        const existing = await this.urlStore.get(fingerprint);
        const captured = this.cookiesEnabled
            ? parseSetCookie(getHeaderValues(response, TusHeader.SET_COOKIE))
            : [];

        await this.urlStore.set(
            fingerprint,
            new UrlDetail(uploadUrl, existing?.cookies ?? []).withCookies(captured),
        );
    }
}
