export enum TusHeader {
    TUS_RESUMABLE = 'Tus-Resumable',
    UPLOAD_LENGTH = 'Upload-Length',
    UPLOAD_METADATA = 'Upload-Metadata',
    UPLOAD_OFFSET = 'Upload-Offset',
    LOCATION = 'Location',
    COOKIE = 'Cookie',
    SET_COOKIE = 'Set-Cookie',
    CONTENT_TYPE = 'Content-Type',
}

export const OFFSET_OCTET_STREAM = 'application/offset+octet-stream';
