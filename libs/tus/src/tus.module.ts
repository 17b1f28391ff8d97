import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import tusConfig, { TusConfig } from './tus.config';
import { TusClient } from './services/tus-client.service';
import { TusUrlMemoryStore } from './stores/tus-url-memory.store';
import { AxiosHttpTransport } from './transport/axios-http.transport';
import { HttpTransport } from './interfaces/http-transport.interface';
import { TusUrlStore } from './interfaces/tus-url-store.interface';
import { TUS_HTTP_TRANSPORT, TUS_URL_STORE } from './tus.constants';

export interface TusModuleOptions {
    /**
     * Where upload URLs are kept for resuming. Defaults to a store living in
     * memory for as long as this module does.
     */
    urlStore?: TusUrlStore;
    transport?: HttpTransport;
}

@Module({})
export class TusModule {
    static register(options: TusModuleOptions = {}): DynamicModule {
        return {
            module: TusModule,
            imports: [ConfigModule.forFeature(tusConfig)],
            providers: [
                {
                    provide: TUS_URL_STORE,
                    useValue: options.urlStore ?? new TusUrlMemoryStore(),
                },
                {
                    provide: TUS_HTTP_TRANSPORT,
                    useFactory: (config: TusConfig): HttpTransport =>
                        options.transport ?? new AxiosHttpTransport({
                            followRedirects: config.followRedirects,
                            maxRedirects: config.maxRedirects,
                        }),
                    inject: [tusConfig.KEY],
                },
                TusClient,
            ],
            exports: [TusClient, TUS_URL_STORE, TUS_HTTP_TRANSPORT],
        };
    }
}
