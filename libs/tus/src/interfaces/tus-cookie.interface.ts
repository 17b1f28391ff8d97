export interface TusCookie {
    name: string;
    value: string;
    domain?: string;
    path?: string;
    /** Epoch milliseconds. Session cookies have none. */
    expiresAt?: number;
}
