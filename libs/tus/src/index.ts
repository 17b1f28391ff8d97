import 'reflect-metadata';

export * from './tus.module';
export * from './tus.constants';
export * from './tus-header.enum';
export { default as tusConfig, TusConfig, validateTusConfig } from './tus.config';
export * from './errors/tus.errors';
export * from './interfaces/http-transport.interface';
export * from './interfaces/tus-cookie.interface';
export * from './interfaces/tus-url-store.interface';
export * from './models/url-detail';
export * from './models/tus-upload';
export * from './models/upload-source';
export * from './cookies/cookie-codec';
export * from './stores/tus-url-memory.store';
export * from './transport/axios-http.transport';
export * from './transport/response-headers';
export * from './services/tus-client.service';
export * from './services/tus-uploader';
export * from './services/resume-outcome';
