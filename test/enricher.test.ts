import { VerseLookup, enrichReferences } from '../src/enricher';
import { LookupFailure, TransportFailure } from '../src/errors';
import { VerseDetail, VerseReference } from '../src/types';

const detailFor = (reference: VerseReference): VerseDetail => ({
    arabic_text: `آية ${reference.sura}:${reference.verse}`,
    transliteration: 'aya',
    translations: { 'Saheeh International': `verse ${reference.verse}` },
});

describe('enrichReferences', () => {
    it('should key details by verse and look each reference up in order', async () => {
        const seen: string[] = [];
        const client: VerseLookup = {
            lookup: async reference => {
                seen.push(`${reference.sura}:${reference.verse}`);
                return detailFor(reference);
            },
        };

        const result = await enrichReferences([{ sura: 16, verse: 89 }, { sura: 2, verse: 255 }], client);

        expect(seen).toEqual(['16:89', '2:255']);
        expect([...result.details.keys()]).toEqual(['16:89', '2:255']);
        expect(result.details.get('2:255')?.translations['Saheeh International']).toBe('verse 255');
        expect(result.failures).toEqual([]);
    });

    it('should send progress lines to the given log', async () => {
        const messages: string[] = [];
        const client: VerseLookup = { lookup: async reference => detailFor(reference) };

        await enrichReferences([{ sura: 16, verse: 89 }], client, message => messages.push(message));

        expect(messages).toEqual(['Looking up 16:89 (1/1)']);
    });

    it('should keep going after a failed lookup', async () => {
        const client: VerseLookup = {
            lookup: async reference => {
                if (reference.sura === 16) {
                    throw new LookupFailure(reference, 404, 'HTTP 404 Not Found');
                }
                return detailFor(reference);
            },
        };

        const result = await enrichReferences([{ sura: 16, verse: 89 }, { sura: 2, verse: 255 }], client);

        expect([...result.details.keys()]).toEqual(['2:255']);
        expect(result.failures).toHaveLength(1);
        expect(result.failures[0].message).toBe('Lookup of 16:89 failed: HTTP 404 Not Found');
    });

    it('should record unexpected errors as transport failures', async () => {
        const client: VerseLookup = {
            lookup: async () => {
                throw new Error('socket hang up');
            },
        };

        const result = await enrichReferences([{ sura: 1, verse: 1 }], client);

        expect(result.failures[0]).toBeInstanceOf(TransportFailure);
        expect(result.failures[0].message).toBe('Request for 1:1 failed: socket hang up');
        expect(result.failures[0].reference).toEqual({ sura: 1, verse: 1 });
    });
});
