import {
    FingerprintNotFoundError,
    ResumingNotEnabledError,
    TusProtocolError,
    TusTransportError,
} from '../errors/tus.errors';
import { TransportResponse } from '../interfaces/http-transport.interface';
import { classifyResumeFailure, settleResume, shouldCreateAfterResume } from './resume-outcome';

const responseWithStatus = (status: number): TransportResponse => ({
    status,
    headers: {},
    url: new URL('https://tus.example.test/files/abc'),
});

describe('resume-outcome', () => {
    describe('settleResume', () => {
        it('should wrap a successful attempt', async () => {
            await expect(settleResume(async () => 42)).resolves.toEqual({ kind: 'resumed', value: 42 });
        });

        it('should classify a rejected attempt', async () => {
            const error = new FingerprintNotFoundError('foo');

            await expect(settleResume(async () => { throw error; })).resolves.toEqual({
                kind: 'fingerprint-not-found',
                error,
            });
        });
    });

    describe('classifyResumeFailure', () => {
        it('should carry the status of a protocol error', () => {
            const error = new TusProtocolError('unexpected status code (410)', responseWithStatus(410));

            expect(classifyResumeFailure(error)).toEqual({ kind: 'protocol-error', status: 410, error });
        });

        it('should treat anything else as a transport error', () => {
            const error = new TusTransportError('HEAD failed', new Error('ECONNRESET'));

            expect(classifyResumeFailure(error)).toEqual({ kind: 'transport-error', error });
        });
    });

    describe('shouldCreateAfterResume', () => {
        it.each([
            ['an unknown fingerprint', new FingerprintNotFoundError('foo'), true],
            ['disabled resuming', new ResumingNotEnabledError(), true],
            ['a 404 response', new TusProtocolError('gone', responseWithStatus(404)), true],
            ['a 410 response', new TusProtocolError('gone', responseWithStatus(410)), false],
            ['a 500 response', new TusProtocolError('boom', responseWithStatus(500)), false],
            ['a protocol error without response', new TusProtocolError('no offset'), false],
            ['a transport error', new TusTransportError('down', new Error('ECONNREFUSED')), false],
        ])('should decide on %s', (_, error, expected) => {
            expect(shouldCreateAfterResume(classifyResumeFailure(error))).toBe(expected);
        });
    });
});
