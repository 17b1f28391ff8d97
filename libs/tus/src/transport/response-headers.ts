import { TransportResponse } from '../interfaces/http-transport.interface';

export function getHeaderValues(response: TransportResponse, name: string): string[] {
    const value = response.headers[name.toLowerCase()];
    if (value === undefined) {
        return [];
    }
    return typeof value === 'string' ? [value] : [...value];
}

export function getHeader(response: TransportResponse, name: string): string | undefined {
    return getHeaderValues(response, name)[0];
}

export function isSuccessStatus(status: number): boolean {
    return status >= 200 && status < 300;
}
