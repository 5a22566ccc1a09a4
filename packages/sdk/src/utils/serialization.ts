import superjson from 'superjson';

const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

// Handler outputs routinely carry raw bytes (downloaded files); keep them as base64.
superjson.registerCustom<Buffer, string>(
    {
        isApplicable: (v): v is Buffer => Buffer.isBuffer(v),
        serialize: v => v.toString('base64'),
        deserialize: v => Buffer.from(v, 'base64'),
    },
    'buffer',
);

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

        if (Buffer.byteLength(stringified) > MAX_PAYLOAD_SIZE) {
            throw new SerializationError(
                `Payload size exceeds maximum limit of 1MB. Current size: ${(Buffer.byteLength(stringified) / 1024 / 1024).toFixed(2)}MB`
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

/** Encoded size in bytes of a value, without the payload cap. */
export function payloadSize(value: unknown): number {
    if (value === undefined) return 0;
    return Buffer.byteLength(superjson.stringify(value));
}

/** Plain-JSON view of a value for wire formats that only speak JSON (Buffers become base64 strings). */
export function toJSONSafe(value: unknown): unknown {
    return JSON.parse(JSON.stringify(value, (_key, v: unknown) => {
        if (isSerializedBuffer(v)) return Buffer.from(v.data).toString('base64');
        return v;
    }) ?? 'null');
}

function isSerializedBuffer(v: unknown): v is { type: 'Buffer'; data: number[] } {
    return typeof v === 'object' && v !== null && 'type' in v && v.type === 'Buffer' && 'data' in v && Array.isArray(v.data);
}
