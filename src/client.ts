import * as core from '@actions/core';
import { ConfigurationError, LookupFailure, TransportFailure, describeError } from './errors';
import { VerseResponseSchema, formatIssues } from './schemas';
import { verseKey } from './resolver';
import { VerseDetail, VerseReference } from './types';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/** Translations the API serves by resource id. Order here is render order. */
export const SUPPORTED_TRANSLATORS = [
    { name: 'Saheeh International', resourceId: 20 },
    { name: 'Pickthall', resourceId: 19 },
    { name: 'Abdel Haleem', resourceId: 85 },
    { name: 'Yusuf Ali', resourceId: 22 },
    { name: 'Hilali & Khan', resourceId: 203 },
    { name: 'Taqi Usmani', resourceId: 84 },
] as const;

export const DEFAULT_TRANSLATORS = ['Saheeh International', 'Pickthall'];

export const TRANSLITERATION_RESOURCE_ID = 57;

const ARABIC_FIELDS = ['text_imlaei', 'text_uthmani'];

/**
 * Resolves translator names (case-insensitive) to their canonical names in
 * the fixed render order, dropping duplicates.
 */
export function resolveTranslators(names: readonly string[]): string[] {
    const wanted = new Set<string>();
    for (const name of names) {
        const match = SUPPORTED_TRANSLATORS.find(t => t.name.toLowerCase() === name.trim().toLowerCase());
        if (!match) {
            const supported = SUPPORTED_TRANSLATORS.map(t => t.name).join(', ');
            throw new ConfigurationError(`Unsupported translation '${name}'. Supported: ${supported}`);
        }
        wanted.add(match.name);
    }
    return SUPPORTED_TRANSLATORS.filter(t => wanted.has(t.name)).map(t => t.name);
}

export interface VerseApiConfig {
    baseUrl: string;
    token: string;
    clientId?: string;
    timeoutMs: number;
}

export interface VerseApiClientOptions extends VerseApiConfig {
    translators: string[];
    fetch?: FetchLike;
    log?: (message: string) => void; // defaults to core.debug
}

export class VerseApiClient {
    private readonly baseUrl: string;
    private readonly token: string;
    private readonly clientId?: string;
    private readonly timeoutMs: number;
    private readonly translators: { name: string; resourceId: number }[];
    private readonly fetchImpl: FetchLike;
    private readonly log: (message: string) => void;

    constructor(options: VerseApiClientOptions) {
        if (!options.token) {
            throw new ConfigurationError('Verse API token is empty');
        }
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.token = options.token;
        this.clientId = options.clientId;
        this.timeoutMs = options.timeoutMs;
        const names: string[] = resolveTranslators(options.translators);
        this.translators = SUPPORTED_TRANSLATORS
            .filter(t => names.includes(t.name))
            .map(t => ({ name: t.name, resourceId: t.resourceId }));
        this.fetchImpl = options.fetch ?? fetch;
        this.log = options.log ?? core.debug;
    }

    public get translatorNames(): string[] {
        return this.translators.map(t => t.name);
    }

    public verseUrl(reference: VerseReference): string {
        const resources = [...this.translators.map(t => t.resourceId), TRANSLITERATION_RESOURCE_ID];
        return `${this.baseUrl}/verses/by_key/${verseKey(reference)}?fields=${ARABIC_FIELDS.join(',')}&translations=${resources.join(',')}`;
    }

    /**
     * One request, no retry. Rejects with LookupFailure for HTTP errors and
     * unusable bodies, TransportFailure for network errors and timeouts.
     */
    public async lookup(reference: VerseReference): Promise<VerseDetail> {
        const url = this.verseUrl(reference);
        const headers: Record<string, string> = {
            Accept: 'application/json',
            Authorization: `Bearer ${this.token}`,
            'x-auth-token': this.token,
        };
        if (this.clientId) {
            headers['x-client-id'] = this.clientId;
        }

        this.log(`GET ${url}`);
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);
        try {
            let response: Response;
            try {
                response = await this.fetchImpl(url, { headers, signal: controller.signal });
            } catch (error) {
                throw new TransportFailure(reference, this.transportMessage(controller, error));
            }

            if (!response.ok) {
                throw new LookupFailure(reference, response.status, `HTTP ${response.status} ${response.statusText}`.trim());
            }

            let body: unknown;
            try {
                body = await response.json();
            } catch (error) {
                if (controller.signal.aborted) {
                    throw new TransportFailure(reference, this.transportMessage(controller, error));
                }
                throw new LookupFailure(reference, response.status, `malformed JSON body: ${describeError(error)}`);
            }
            return this.toVerseDetail(reference, response.status, body);
        } finally {
            clearTimeout(timer);
        }
    }

    private transportMessage(controller: AbortController, error: unknown): string {
        return controller.signal.aborted ? `timed out after ${this.timeoutMs} ms` : describeError(error);
    }

    private toVerseDetail(reference: VerseReference, status: number, body: unknown): VerseDetail {
        const parsed = VerseResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new LookupFailure(reference, status, `unexpected response: ${formatIssues(parsed.error)}`);
        }
        const verse = parsed.data.verse;

        const arabic = verse.text_imlaei || verse.text_uthmani;
        if (!arabic) {
            throw new LookupFailure(reference, status, `missing field verse.${ARABIC_FIELDS.join(' / verse.')}`);
        }

        const byResource = new Map<number, string>();
        for (const translation of verse.translations ?? []) {
            byResource.set(translation.resource_id, translation.text);
        }

        const transliteration = byResource.get(TRANSLITERATION_RESOURCE_ID);
        if (transliteration === undefined) {
            throw new LookupFailure(reference, status, `missing transliteration (resource ${TRANSLITERATION_RESOURCE_ID})`);
        }

        const translations: Record<string, string> = {};
        for (const translator of this.translators) {
            const text = byResource.get(translator.resourceId);
            if (text === undefined) {
                throw new LookupFailure(reference, status, `missing translation '${translator.name}' (resource ${translator.resourceId})`);
            }
            translations[translator.name] = text;
        }

        return Object.freeze({
            arabic_text: arabic,
            transliteration,
            translations: Object.freeze(translations),
        });
    }
}
