import { TransportResponse } from '../interfaces/http-transport.interface';

export class TusError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The client was used without the setup the operation needs.
 */
export class TusConfigurationError extends TusError { }

export class ResumingNotEnabledError extends TusConfigurationError {
    constructor() {
        super('resuming not enabled for this client, use enableResuming() to do so');
    }
}

export class FingerprintNotFoundError extends TusError {
    constructor(readonly fingerprint: string) {
        super(`fingerprint not in storage found: ${fingerprint}`);
    }
}

/**
 * The server answered, but not the way the protocol requires: unexpected
 * status code or a missing or invalid header.
 */
export class TusProtocolError extends TusError {
    constructor(message: string, readonly response?: TransportResponse) {
        super(message);
    }

    get status(): number | undefined {
        return this.response?.status;
    }
}

/**
 * The HTTP exchange could not be completed at all.
 */
export class TusTransportError extends TusError {
    constructor(message: string, cause: unknown) {
        super(message, { cause });
    }
}
