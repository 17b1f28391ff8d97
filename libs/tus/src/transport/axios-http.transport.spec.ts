import { AxiosHttpTransport } from './axios-http.transport';
import { TransportRequest } from '../interfaces/http-transport.interface';
import { TusTransportError } from '../errors/tus.errors';

describe('AxiosHttpTransport', () => {
    let request: jest.Mock;

    const post: TransportRequest = {
        method: 'POST',
        url: new URL('https://tus.example.test/files/'),
        headers: { 'Tus-Resumable': '1.0.0', 'Upload-Length': '5' },
        timeout: 5000,
    };

    beforeEach(() => {
        request = jest.fn();
    });

    it('should hand axios the request without letting it follow redirects', async () => {
        request.mockResolvedValueOnce({ status: 201, headers: { location: '/files/abc' } });
        const transport = new AxiosHttpTransport({ followRedirects: true }, { request });

        await transport.send(post);

        expect(request).toHaveBeenCalledWith(expect.objectContaining({
            method: 'POST',
            url: 'https://tus.example.test/files/',
            headers: post.headers,
            timeout: 5000,
            maxRedirects: 0,
        }));
    });

    it('should return any status with lower-cased headers', async () => {
        request.mockResolvedValueOnce({
            status: 404,
            headers: { 'Upload-Offset': 7, 'set-cookie': ['a=1', 'b=2'] },
        });
        const transport = new AxiosHttpTransport({ followRedirects: false }, { request });

        const response = await transport.send(post);

        expect(response.status).toBe(404);
        expect(response.headers).toEqual({ 'upload-offset': '7', 'set-cookie': ['a=1', 'b=2'] });
        expect(response.url.href).toBe('https://tus.example.test/files/');
    });

    it('should return a redirect as is when following is off', async () => {
        request.mockResolvedValueOnce({ status: 302, headers: { location: 'https://edge.example.test/files/' } });
        const transport = new AxiosHttpTransport({ followRedirects: false }, { request });

        const response = await transport.send(post);

        expect(response.status).toBe(302);
        expect(request).toHaveBeenCalledTimes(1);
    });

    it('should follow redirects keeping the method and report the final URL', async () => {
        request
            .mockResolvedValueOnce({ status: 302, headers: { location: 'https://edge.example.test/uploads/' } })
            .mockResolvedValueOnce({ status: 307, headers: { location: 'v2/' } })
            .mockResolvedValueOnce({ status: 201, headers: { location: 'abc' } });
        const transport = new AxiosHttpTransport({ followRedirects: true }, { request });

        const response = await transport.send(post);

        expect(request.mock.calls.map(([config]) => [config.method, config.url])).toEqual([
            ['POST', 'https://tus.example.test/files/'],
            ['POST', 'https://edge.example.test/uploads/'],
            ['POST', 'https://edge.example.test/uploads/v2/'],
        ]);
        expect(response.status).toBe(201);
        expect(response.url.href).toBe('https://edge.example.test/uploads/v2/');
    });

    it('should stop after the configured number of redirects', async () => {
        request.mockResolvedValue({ status: 302, headers: { location: '/again' } });
        const transport = new AxiosHttpTransport({ followRedirects: true, maxRedirects: 2 }, { request });

        const response = await transport.send(post);

        expect(response.status).toBe(302);
        expect(request).toHaveBeenCalledTimes(3);
    });

    it('should return a 303 as is instead of following it', async () => {
        request.mockResolvedValueOnce({ status: 303, headers: { location: 'https://tus.example.test/other/' } });
        const transport = new AxiosHttpTransport({ followRedirects: true }, { request });

        const response = await transport.send(post);

        expect(response.status).toBe(303);
        expect(request).toHaveBeenCalledTimes(1);
    });

    it('should drop credentials when a redirect leaves the origin', async () => {
        request
            .mockResolvedValueOnce({ status: 307, headers: { location: '/files/v2/' } })
            .mockResolvedValueOnce({ status: 307, headers: { location: 'https://other.example.test/files/' } })
            .mockResolvedValueOnce({ status: 201, headers: { location: 'abc' } });
        const transport = new AxiosHttpTransport({ followRedirects: true }, { request });

        await transport.send({
            ...post,
            headers: {
                ...post.headers,
                Cookie: 'session=s1',
                Authorization: 'Bearer test-secret',
                'Proxy-Authorization': 'Basic test-secret',
            },
        });

        expect(request.mock.calls[1][0].headers).toEqual({
            'Tus-Resumable': '1.0.0',
            'Upload-Length': '5',
            Cookie: 'session=s1',
            Authorization: 'Bearer test-secret',
            'Proxy-Authorization': 'Basic test-secret',
        });
        expect(request.mock.calls[2][0].headers).toEqual({ 'Tus-Resumable': '1.0.0', 'Upload-Length': '5' });
    });

    it('should keep cookies set by redirects from the final origin', async () => {
        request
            .mockResolvedValueOnce({ status: 302, headers: { location: 'https://edge.example.test/files/', 'set-cookie': ['origin=a'] } })
            .mockResolvedValueOnce({ status: 308, headers: { location: '/files/v2/', 'set-cookie': ['edge=b'] } })
            .mockResolvedValueOnce({ status: 201, headers: { location: 'abc', 'set-cookie': ['final=c'] } });
        const transport = new AxiosHttpTransport({ followRedirects: true }, { request });

        const response = await transport.send(post);

        expect(response.headers['set-cookie']).toEqual(['edge=b', 'final=c']);
    });

    it('should wrap failed exchanges in a transport error', async () => {
        const cause = new Error('connect ECONNREFUSED 127.0.0.1:1080');
        request.mockRejectedValueOnce(cause);
        const transport = new AxiosHttpTransport({ followRedirects: false }, { request });

        const error = await transport.send(post).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(TusTransportError);
        expect(error).toMatchObject({
            message: 'POST https://tus.example.test/files/ failed: connect ECONNREFUSED 127.0.0.1:1080',
            cause,
        });
    });
});
