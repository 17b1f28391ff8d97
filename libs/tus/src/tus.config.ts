import { registerAs } from '@nestjs/config';
import { plainToInstance, Transform, Type } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsUrl, Min, validateSync } from 'class-validator';
import { TusConfigurationError } from './errors/tus.errors';
import { DEFAULT_CHUNK_SIZE, DEFAULT_CONNECT_TIMEOUT, DEFAULT_MAX_REDIRECTS } from './tus.constants';

const toBoolean = ({ value }: { value: unknown }): unknown => {
    if (value === undefined || value === '') return false;
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    return value;
};

export class TusConfig {
    @IsOptional()
    @IsUrl({ require_tld: false, require_protocol: true, protocols: ['http', 'https'] })
    uploadCreationUrl?: string;

    @Type(() => Number)
    @IsInt()
    @Min(0)
    connectTimeout!: number;

    @Transform(toBoolean)
    @IsBoolean()
    resumingEnabled!: boolean;

    @Transform(toBoolean)
    @IsBoolean()
    cookiesEnabled!: boolean;

    @Transform(toBoolean)
    @IsBoolean()
    removeFingerprintOnSuccess!: boolean;

    /**
     * Process-wide switch for following redirects. Off means a 3xx response
     * ends the request and surfaces as a protocol error.
     */
    @Transform(toBoolean)
    @IsBoolean()
    followRedirects!: boolean;

    @Type(() => Number)
    @IsInt()
    @Min(0)
    maxRedirects!: number;

    @Type(() => Number)
    @IsInt()
    @Min(1)
    chunkSize!: number;
}

/**
 * Converts raw (string) values into a {@link TusConfig}.
 * @throws TusConfigurationError listing every invalid value
 */
export function validateTusConfig(raw: Record<string, unknown>): TusConfig {
    const config = plainToInstance(TusConfig, raw);
    const errors = validateSync(config, { skipMissingProperties: false });

    if (errors.length > 0) {
        const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
        throw new TusConfigurationError(`Invalid tus configuration: ${messages.join('; ')}`);
    }

    return config;
}

export default registerAs('tus', (): TusConfig => validateTusConfig({
    uploadCreationUrl: process.env.TUS_UPLOAD_CREATION_URL || undefined,
    connectTimeout: process.env.TUS_CONNECT_TIMEOUT || DEFAULT_CONNECT_TIMEOUT,
    resumingEnabled: process.env.TUS_RESUMING_ENABLED,
    cookiesEnabled: process.env.TUS_COOKIES_ENABLED,
    removeFingerprintOnSuccess: process.env.TUS_REMOVE_FINGERPRINT_ON_SUCCESS,
    followRedirects: process.env.TUS_FOLLOW_REDIRECTS,
    maxRedirects: process.env.TUS_MAX_REDIRECTS || DEFAULT_MAX_REDIRECTS,
    chunkSize: process.env.TUS_CHUNK_SIZE || DEFAULT_CHUNK_SIZE,
}));
