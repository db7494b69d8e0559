import superjson from 'superjson';

// Step inputs/outputs are arbitrary values returned by callables and models;
// superjson keeps Dates, Maps, Sets and bigints intact across the JSONB round trip.
const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export function serialize(value: unknown): string {
    if (value === undefined) return '';

    let stringified: string;
    try {
        stringified = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }

    const size = Buffer.byteLength(stringified);
    if (size > MAX_PAYLOAD_SIZE) {
        throw new SerializationError(
            `Payload size exceeds maximum limit of 1MB. Current size: ${(size / 1024 / 1024).toFixed(2)}MB`,
        );
    }
    return stringified;
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/** Encodes a value for a JSONB column; `undefined` becomes SQL NULL. */
export function toJsonColumn(value: unknown): string | null {
    const encoded = serialize(value);
    return encoded === '' ? null : encoded;
}

/** Decodes a JSONB column written by `toJsonColumn` (pg hands it back parsed). */
export function fromJsonColumn<T>(stored: unknown): T | undefined {
    if (stored === null || stored === undefined) return undefined;
    return deserialize<T>(typeof stored === 'string' ? stored : JSON.stringify(stored));
}
