import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { TusUpload } from './tus-upload';

describe('TusUpload', () => {
    it('should encode metadata values as base64', () => {
        const upload = TusUpload.fromBuffer(Buffer.from('data'), 'foo', {
            filename: 'report.pdf',
            filetype: 'application/pdf',
        });

        expect(upload.encodedMetadata).toBe('filename cmVwb3J0LnBkZg==,filetype YXBwbGljYXRpb24vcGRm');
    });

    it('should encode no metadata as an empty string', () => {
        expect(TusUpload.fromBuffer(Buffer.from('data'), 'foo').encodedMetadata).toBe('');
    });

    it('should copy metadata on get and set', () => {
        const upload = TusUpload.fromBuffer(Buffer.from('data'), 'foo');
        const metadata = { filename: 'a.txt' };

        upload.setMetadata(metadata);
        metadata.filename = 'b.txt';

        expect(upload.getMetadata()).toEqual({ filename: 'a.txt' });
    });

    it('should read byte ranges from a buffer', async () => {
        const upload = TusUpload.fromBuffer(Buffer.from('hello world'), 'foo');

        expect(upload.size).toBe(11);
        expect((await upload.source.read(6, 100)).toString()).toBe('world');
    });

    describe('fromFile', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(join(tmpdir(), 'tus-upload-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('should fingerprint by absolute path and size and read from the file', async () => {
            const path = join(dir, 'video.bin');
            await writeFile(path, '0123456789');

            const upload = await TusUpload.fromFile(path, { filename: 'video.bin' });

            expect(upload.fingerprint).toBe(`${path}-10`);
            expect(upload.size).toBe(10);
            expect((await upload.source.read(2, 3)).toString()).toBe('234');
            expect((await upload.source.read(8, 5)).toString()).toBe('89');
            await upload.source.close();
        });
    });
});
