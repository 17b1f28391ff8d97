/**
 * Version of the tus protocol spoken by the client. The remote server has to
 * support this version too.
 */
export const TUS_VERSION = '1.0.0';

export const TUS_URL_STORE = Symbol('TUS_URL_STORE');
export const TUS_HTTP_TRANSPORT = Symbol('TUS_HTTP_TRANSPORT');

export const DEFAULT_CONNECT_TIMEOUT = 5000; // 5 seconds
export const DEFAULT_MAX_REDIRECTS = 20;
export const DEFAULT_CHUNK_SIZE = 2 * 1024 * 1024; // 2 MiB
