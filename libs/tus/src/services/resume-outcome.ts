import {
    FingerprintNotFoundError,
    ResumingNotEnabledError,
    TusProtocolError,
} from '../errors/tus.errors';

export type ResumeFailure =
    | { kind: 'fingerprint-not-found'; error: FingerprintNotFoundError }
    | { kind: 'resuming-disabled'; error: ResumingNotEnabledError }
    | { kind: 'protocol-error'; status: number | undefined; error: TusProtocolError }
    | { kind: 'transport-error'; error: unknown };

export type ResumeOutcome<T> = { kind: 'resumed'; value: T } | ResumeFailure;

export function classifyResumeFailure(error: unknown): ResumeFailure {
    if (error instanceof FingerprintNotFoundError) {
        return { kind: 'fingerprint-not-found', error };
    }
    if (error instanceof ResumingNotEnabledError) {
        return { kind: 'resuming-disabled', error };
    }
    if (error instanceof TusProtocolError) {
        return { kind: 'protocol-error', status: error.status, error };
    }
    return { kind: 'transport-error', error };
}

/**
 * Runs a resume attempt and settles it into an outcome instead of throwing.
 */
export async function settleResume<T>(attempt: () => Promise<T>): Promise<ResumeOutcome<T>> {
    try {
        return { kind: 'resumed', value: await attempt() };
    } catch (err) {
        return classifyResumeFailure(err);
    }
}

/**
 * Whether a failed resume should be answered by creating a new upload.
 * A 404 means the server no longer knows the upload (deleted or expired).
 */
export function shouldCreateAfterResume(failure: ResumeFailure): boolean {
    switch (failure.kind) {
        case 'fingerprint-not-found':
        case 'resuming-disabled':
            return true;
        case 'protocol-error':
            return failure.status === 404;
        case 'transport-error':
            return false;
    }
}
