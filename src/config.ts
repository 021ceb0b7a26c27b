import { ConfigurationError } from './errors';
import { VerseApiConfig } from './client';

export const DEFAULT_API_BASE_URL = 'https://apis.quran.foundation/content/api/v4';
export const DEFAULT_TIMEOUT_MS = 10000;

export interface ApiSettings {
    baseUrl: string;
    token?: string;
    clientId?: string;
    timeoutMs: number;
}

function nonBlank(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

export function readApiSettings(env: NodeJS.ProcessEnv = process.env): ApiSettings {
    const rawTimeout = nonBlank(env.QURAN_API_TIMEOUT_MS);
    const timeoutMs = rawTimeout === undefined ? DEFAULT_TIMEOUT_MS : Number(rawTimeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        throw new ConfigurationError(`QURAN_API_TIMEOUT_MS must be a positive whole number of milliseconds, got '${rawTimeout}'`);
    }

    return {
        baseUrl: nonBlank(env.QURAN_API_BASE_URL) ?? DEFAULT_API_BASE_URL,
        token: nonBlank(env.QURAN_API_TOKEN),
        clientId: nonBlank(env.QURAN_CLIENT_ID),
        timeoutMs,
    };
}

/** Client configuration, or a ConfigurationError when no token is set. */
export function resolveApiConfig(settings: ApiSettings): VerseApiConfig {
    if (!settings.token) {
        throw new ConfigurationError('enrichment disabled: no token found. Set QURAN_API_TOKEN.');
    }
    return {
        baseUrl: settings.baseUrl,
        token: settings.token,
        clientId: settings.clientId,
        timeoutMs: settings.timeoutMs,
    };
}
