import { TusUrlStore } from '../interfaces/tus-url-store.interface';
import { TusCookie } from '../interfaces/tus-cookie.interface';
import { UrlDetail } from '../models/url-detail';

/**
 * Keeps the fingerprint to upload URL mapping in a `Map`.
 *
 * Entries live as long as the process does; nothing survives a crash or a
 * restart. Every write replaces the whole entry of a key at once, but two
 * uploads sharing a fingerprint must not write concurrently.
 */
export class TusUrlMemoryStore implements TusUrlStore {
    private readonly store = new Map<string, UrlDetail>();

    async set(fingerprint: string, urlDetail: UrlDetail): Promise<void> {
        this.store.set(fingerprint, urlDetail);
    }

    async get(fingerprint: string): Promise<UrlDetail | undefined> {
        return this.store.get(fingerprint);
    }

    async updateCookies(fingerprint: string, cookies: readonly TusCookie[]): Promise<void> {
        const urlDetail = this.store.get(fingerprint);
        if (urlDetail) {
            this.store.set(fingerprint, urlDetail.withCookies(cookies));
        }
    }

    async remove(fingerprint: string): Promise<void> {
        this.store.delete(fingerprint);
    }
}
