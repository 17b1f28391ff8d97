import { TusCookie } from '../interfaces/tus-cookie.interface';
import { mergeCookies } from '../cookies/cookie-codec';

/**
 * Session entry of one upload: where it lives and which cookies keep the
 * session sticky.
 */
export class UrlDetail {
    readonly cookies: readonly TusCookie[];

    constructor(readonly url: URL, cookies: readonly TusCookie[] = []) {
        this.cookies = [...cookies];
    }

    withCookies(cookies: readonly TusCookie[]): UrlDetail {
        return new UrlDetail(this.url, mergeCookies(this.cookies, cookies));
    }
}
