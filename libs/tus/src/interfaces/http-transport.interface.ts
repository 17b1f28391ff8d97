export type HttpMethod = 'POST' | 'HEAD' | 'PATCH';

export interface TransportRequest {
    method: HttpMethod;
    url: URL;
    headers: Record<string, string>;
    body?: Buffer;
    /** Timeout in milliseconds, 0 disables it. */
    timeout: number;
}

/**
 * Header names are lower-case. Headers the server sent more than once
 * (`set-cookie`) are kept as arrays.
 */
export type ResponseHeaders = Readonly<Record<string, string | readonly string[]>>;

export interface TransportResponse {
    status: number;
    headers: ResponseHeaders;
    /**
     * URL the response was actually received from. Differs from the request
     * URL when the transport followed a redirect.
     */
    url: URL;
}

/**
 * Narrow boundary between the protocol logic and a concrete HTTP stack.
 * Implementations return every response regardless of its status and throw
 * only when the exchange could not be completed.
 */
export interface HttpTransport {
    send(request: TransportRequest): Promise<TransportResponse>;
}
