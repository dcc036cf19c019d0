import { serialize, deserialize, encode, decode, SerializationError } from '../src/utils/serialization';

describe('Serialization Utils', () => {
    test('should serialize and deserialize primitives', () => {
        expect(deserialize(serialize(123))).toBe(123);
        expect(deserialize(serialize('hello'))).toBe('hello');
        expect(deserialize(serialize(null))).toBe(null);
    });

    test('should keep dates inside execution views', () => {
        const createdAt = new Date('2026-01-02T03:04:05.000Z');
        const view = { id: 'exec-1', createdAt, completedAt: null, stages: [['a', 'b'], ['c']] };

        const output = deserialize<typeof view>(serialize(view));

        expect(output?.createdAt).toBeInstanceOf(Date);
        expect(output?.createdAt.toISOString()).toBe('2026-01-02T03:04:05.000Z');
        expect(output?.completedAt).toBeNull();
        expect(output?.stages).toEqual([['a', 'b'], ['c']]);
    });

    test('should enforce 4MB size limit', () => {
        const largeString = 'a'.repeat(4 * 1024 * 1024 + 1);
        expect(() => serialize(largeString)).toThrow(SerializationError);
        expect(() => serialize(largeString)).toThrow(/Payload size exceeds maximum limit/);
    });

    test('should handle undefined and empty bytes', () => {
        expect(serialize(undefined)).toBe('');
        expect(deserialize('')).toBeUndefined();
        expect(decode(Buffer.alloc(0))).toBeUndefined();
    });

    test('should carry values through wire bytes', () => {
        const bytes = encode({ topic: 'release notes', retries: 2 });
        expect(Buffer.isBuffer(bytes)).toBe(true);
        expect(decode(bytes)).toEqual({ topic: 'release notes', retries: 2 });
    });

    test('should reject malformed payloads', () => {
        expect(() => deserialize('{not json')).toThrow(/Failed to deserialize data/);
    });
});
