import superjson from 'superjson';

// Matches the gRPC server's max message length.
const MAX_PAYLOAD_SIZE = 4 * 1024 * 1024;

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export function serialize(value: unknown): string {
    if (value === undefined) return '';

    try {
        const stringified = superjson.stringify(value);
        const size = Buffer.byteLength(stringified);

        if (size > MAX_PAYLOAD_SIZE) {
            throw new SerializationError(
                `Payload size exceeds maximum limit of 4MB. Current size: ${(size / 1024 / 1024).toFixed(2)}MB`
            );
        }

        return stringified;
    } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

// bytes fields on the wire
export function encode(value: unknown): Buffer {
    return Buffer.from(serialize(value), 'utf-8');
}

export function decode<T>(bytes: Buffer | null | undefined): T | undefined {
    if (!bytes || bytes.length === 0) return undefined;
    return deserialize<T>(bytes.toString('utf-8'));
}
