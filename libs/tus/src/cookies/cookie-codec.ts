import { TusCookie } from '../interfaces/tus-cookie.interface';

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const SET_COOKIE_PREFIX = /^set-cookie2?:/i;
const RESERVED_NAMES = new Set([
    'comment',
    'commenturl',
    'discard',
    'domain',
    'expires',
    'httponly',
    'max-age',
    'path',
    'port',
    'secure',
    'version',
]);

function unquote(value: string): string {
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
        return value.slice(1, -1);
    }
    return value;
}

function splitPair(part: string): [string, string | undefined] {
    const idx = part.indexOf('=');
    if (idx < 0) {
        return [part.trim(), undefined];
    }
    return [part.slice(0, idx).trim(), part.slice(idx + 1).trim()];
}

/**
 * Parses a single `Set-Cookie` header value.
 * @returns The cookie, or `undefined` when the value is malformed.
 */
export function parseSetCookieValue(header: string, now: number = Date.now()): TusCookie | undefined {
    const parts = header.replace(SET_COOKIE_PREFIX, '').split(';');
    const [name, rawValue] = splitPair(parts[0] ?? '');

    if (rawValue === undefined || !TOKEN.test(name) || name.startsWith('$')) {
        return undefined;
    }
    if (RESERVED_NAMES.has(name.toLowerCase())) {
        return undefined;
    }

    const cookie: TusCookie = { name, value: unquote(rawValue) };
    let maxAge: number | undefined;
    let expires: number | undefined;

    for (const part of parts.slice(1)) {
        const [attribute, attributeValue] = splitPair(part);
        if (attributeValue === undefined) {
            continue;
        }

        switch (attribute.toLowerCase()) {
            case 'domain':
                if (attributeValue !== '') cookie.domain = attributeValue;
                break;
            case 'path':
                if (attributeValue !== '') cookie.path = attributeValue;
                break;
            case 'max-age': {
                const seconds = Number.parseInt(attributeValue, 10);
                if (Number.isFinite(seconds)) maxAge = seconds;
                break;
            }
            case 'expires': {
                const at = Date.parse(unquote(attributeValue));
                if (Number.isFinite(at)) expires = at;
                break;
            }
        }
    }

    // Max-Age wins over Expires
    if (maxAge !== undefined) {
        cookie.expiresAt = now + Math.max(maxAge, 0) * 1000;
    } else if (expires !== undefined) {
        cookie.expiresAt = expires;
    }

    return cookie;
}

function cookieKey(cookie: TusCookie): string {
    return [cookie.name, cookie.domain?.toLowerCase() ?? '', cookie.path ?? ''].join('\u0000');
}

/**
 * Union of two cookie sets. A cookie from `incoming` with the same name,
 * domain and path as an existing one takes its place.
 */
export function mergeCookies(existing: readonly TusCookie[], incoming: readonly TusCookie[]): TusCookie[] {
    const merged = new Map<string, TusCookie>();
    for (const cookie of [...existing, ...incoming]) {
        merged.set(cookieKey(cookie), cookie);
    }
    return [...merged.values()];
}

/**
 * Parses every `Set-Cookie` value independently. Values that cannot be
 * parsed are dropped without failing the others.
 */
export function parseSetCookie(values: readonly string[], now: number = Date.now()): TusCookie[] {
    const cookies: TusCookie[] = [];
    for (const value of values) {
        const cookie = parseSetCookieValue(value, now);
        if (cookie) {
            cookies.push(cookie);
        }
    }
    return mergeCookies([], cookies);
}

export function isCookieExpired(cookie: TusCookie, now: number = Date.now()): boolean {
    return cookie.expiresAt !== undefined && cookie.expiresAt <= now;
}

/**
 * Builds the value of a `Cookie` request header.
 * @returns `undefined` when no cookie is left to send.
 */
export function serializeCookieHeader(cookies: readonly TusCookie[], now: number = Date.now()): string | undefined {
    const pairs = cookies
        .filter((cookie) => !isCookieExpired(cookie, now))
        .map((cookie) => `${cookie.name}=${cookie.value}`);

    return pairs.length > 0 ? pairs.join('; ') : undefined;
}
