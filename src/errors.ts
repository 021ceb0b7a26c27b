import { VerseReference } from './types';

/**
 * A spreadsheet row that could not become a record. Collected, never thrown
 * out of the normalizer.
 */
export class RowValidationError extends Error {
    public readonly rowIndex: number;
    public readonly missingColumns: string[];

    constructor(rowIndex: number, message: string, missingColumns: string[] = []) {
        super(`Row ${rowIndex}: ${message}`);
        this.name = 'RowValidationError';
        this.rowIndex = rowIndex;
        this.missingColumns = missingColumns;
    }
}

/** Missing credentials, endpoint or external tool. Fatal to one stage only. */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class LookupFailure extends Error {
    public readonly reference: VerseReference;
    public readonly status: number | null;

    constructor(reference: VerseReference, status: number | null, message: string) {
        super(`Lookup of ${reference.sura}:${reference.verse} failed: ${message}`);
        this.name = 'LookupFailure';
        this.reference = reference;
        this.status = status;
    }
}

export class TransportFailure extends Error {
    public readonly reference: VerseReference;

    constructor(reference: VerseReference, message: string) {
        super(`Request for ${reference.sura}:${reference.verse} failed: ${message}`);
        this.name = 'TransportFailure';
        this.reference = reference;
    }
}

export type VerseFailure = LookupFailure | TransportFailure;

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export class SpreadsheetError extends Error {
    constructor(filePath: string, message: string) {
        super(`${filePath}: ${message}`);
        this.name = 'SpreadsheetError';
    }
}

export class IntermediateFormatError extends Error {
    constructor(filePath: string, message: string) {
        super(`${filePath}: ${message}`);
        this.name = 'IntermediateFormatError';
    }
}

export class CompileError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CompileError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
