import * as core from '@actions/core';
import { LookupFailure, TransportFailure, VerseFailure, describeError } from './errors';
import { verseKey } from './resolver';
import { VerseDetail, VerseReference } from './types';

export interface VerseLookup {
    lookup(reference: VerseReference): Promise<VerseDetail>;
}

export interface EnrichmentResult {
    details: Map<string, VerseDetail>; // keyed by verseKey
    failures: VerseFailure[];
}

/**
 * Looks references up one at a time, in the order given. A failed lookup is
 * recorded and the next reference is tried.
 */
export async function enrichReferences(
    references: readonly VerseReference[],
    client: VerseLookup,
    log: (message: string) => void = core.debug
): Promise<EnrichmentResult> {
    const result: EnrichmentResult = { details: new Map(), failures: [] };

    for (const [i, reference] of references.entries()) {
        const key = verseKey(reference);
        log(`Looking up ${key} (${i + 1}/${references.length})`);
        try {
            const detail = await client.lookup(reference);
            result.details.set(key, detail);
        } catch (error) {
            const failure = error instanceof LookupFailure || error instanceof TransportFailure
                ? error
                : new TransportFailure(reference, describeError(error));
            core.warning(`${failure.message}. Exercises citing ${key} are rendered without verse text.`);
            result.failures.push(failure);
        }
    }

    return result;
}
