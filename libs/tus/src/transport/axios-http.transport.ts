import { Logger } from '@nestjs/common';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import {
    HttpTransport,
    ResponseHeaders,
    TransportRequest,
    TransportResponse,
} from '../interfaces/http-transport.interface';
import { TusTransportError } from '../errors/tus.errors';
import { DEFAULT_MAX_REDIRECTS } from '../tus.constants';
import { TusHeader } from '../tus-header.enum';
import { getHeaderValues } from './response-headers';

// 303 asks for a GET, which a tus request cannot be turned into.
const REDIRECT_STATUSES = [301, 302, 307, 308];
const CREDENTIAL_HEADERS = ['authorization', 'cookie', 'proxy-authorization'];

export interface AxiosHttpTransportOptions {
    /**
     * Follow redirects, keeping method and body. When off, a 3xx response is
     * handed back to the caller as is.
     */
    followRedirects: boolean;
    maxRedirects?: number;
}

/**
 * HTTP transport backed by axios.
 *
 * axios itself never follows redirects here: its redirect handling rewrites a
 * redirected POST into a GET, which would silently turn an upload creation
 * into a lookup. Redirects are followed by this class instead.
 *
 * A hop to another origin drops the `Authorization`, `Cookie` and
 * `Proxy-Authorization` headers. `Set-Cookie` values of intermediate hops
 * are prepended to the final response's when they came from its origin;
 * those from other origins are discarded.
 */
export class AxiosHttpTransport implements HttpTransport {
    private readonly logger = new Logger(AxiosHttpTransport.name);
    private readonly maxRedirects: number;

    constructor(
        private readonly options: AxiosHttpTransportOptions,
        private readonly http: Pick<AxiosInstance, 'request'> = axios.create(),
    ) {
        this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    }

    async send(request: TransportRequest): Promise<TransportResponse> {
        let url = request.url;
        let headers = request.headers;
        const hops: TransportResponse[] = [];

        for (let hop = 0; ; hop++) {
            const response = await this.exchange(request, url, headers);
            const location = response.headers['location'];

            if (
                !this.options.followRedirects ||
                !REDIRECT_STATUSES.includes(response.status) ||
                typeof location !== 'string' ||
                hop >= this.maxRedirects
            ) {
                return withRedirectCookies(response, hops);
            }

            let next: URL;
            try {
                next = new URL(location, url);
            } catch (err) {
                throw new TusTransportError(`${request.method} ${url.href} redirected to an invalid location: ${location}`, err);
            }
            this.logger.debug(`Following ${response.status} redirect of ${request.method} ${url.href} to ${next.href}`);

            if (next.origin !== url.origin) {
                headers = withoutCredentials(headers);
            }
            hops.push(response);
            url = next;
        }
    }

    private async exchange(
        request: TransportRequest,
        url: URL,
        headers: Record<string, string>,
    ): Promise<TransportResponse> {
        let response: AxiosResponse<string>;
        try {
            response = await this.http.request<string>({
                method: request.method,
                url: url.href,
                headers,
                data: request.body,
                timeout: request.timeout,
                maxRedirects: 0,
                responseType: 'text',
                validateStatus: () => true,
            });
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new TusTransportError(`${request.method} ${url.href} failed: ${reason}`, err);
        }

        return {
            status: response.status,
            headers: normalizeHeaders(response.headers),
            url,
        };
    }
}

function withoutCredentials(headers: Record<string, string>): Record<string, string> {
    return Object.fromEntries(
        Object.entries(headers).filter(([name]) => !CREDENTIAL_HEADERS.includes(name.toLowerCase())),
    );
}

function withRedirectCookies(response: TransportResponse, hops: readonly TransportResponse[]): TransportResponse {
    const carried = hops
        .filter((hop) => hop.url.origin === response.url.origin)
        .flatMap((hop) => getHeaderValues(hop, TusHeader.SET_COOKIE));
    if (carried.length === 0) {
        return response;
    }

    return {
        ...response,
        headers: {
            ...response.headers,
            'set-cookie': [...carried, ...getHeaderValues(response, TusHeader.SET_COOKIE)],
        },
    };
}

function normalizeHeaders(headers: AxiosResponse['headers']): ResponseHeaders {
    const normalized: Record<string, string | string[]> = {};

    for (const [name, value] of Object.entries(headers)) {
        if (Array.isArray(value)) {
            normalized[name.toLowerCase()] = value.map((item) => String(item));
        } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            normalized[name.toLowerCase()] = String(value);
        }
    }

    return normalized;
}
