import { UrlDetail } from '../models/url-detail';
import { TusCookie } from './tus-cookie.interface';

/**
 * Maps an upload's fingerprint to the upload URL and session cookies the
 * server handed out for it. This is what allows resuming an upload after the
 * process that started it went away, provided the implementation persists.
 */
export interface TusUrlStore {
    /**
     * Store the entry for a fingerprint, replacing any previous one.
     */
    set(fingerprint: string, urlDetail: UrlDetail): Promise<void>;

    /**
     * Look up the entry for a fingerprint. Resolves to `undefined` when there
     * is none; never rejects for an unknown key.
     */
    get(fingerprint: string): Promise<UrlDetail | undefined>;

    /**
     * Merge cookies into the entry of an already stored fingerprint. Does
     * nothing when the fingerprint is unknown.
     */
    updateCookies(fingerprint: string, cookies: readonly TusCookie[]): Promise<void>;

    /**
     * Remove the entry for a fingerprint. Removing an unknown fingerprint is
     * not an error.
     */
    remove(fingerprint: string): Promise<void>;
}
