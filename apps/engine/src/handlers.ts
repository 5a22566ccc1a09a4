import { completed, defineHandler, failed, HandlerRegistry } from '@canvasflow/sdk';

const DEFAULT_CHUNK_SIZE = 500;

function chunkSizeOf(value: unknown): number | string {
    if (value === undefined) return DEFAULT_CHUNK_SIZE;
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
        return `chunk_size must be a positive integer, got ${JSON.stringify(value)}`;
    }
    return value;
}

/**
 * Greedily packs pieces into chunks of at most `size` characters (joiners
 * not counted). A piece longer than `size` gets a chunk of its own.
 */
export function packChunks(pieces: string[], size: number, joiner: string): string[] {
    const chunks: string[] = [];
    let current: string[] = [];
    let length = 0;

    for (const piece of pieces) {
        if (current.length > 0 && length + piece.length > size) {
            chunks.push(current.join(joiner));
            current = [];
            length = 0;
        }
        current.push(piece);
        length += piece.length;
    }
    if (current.length > 0) chunks.push(current.join(joiner));
    return chunks;
}

export function splitSentences(text: string): string[] {
    return text.split(/(?<=[.!?]) +/).filter(s => s.length > 0);
}

/** Echoes a fixed query into the run. */
export const userInput = defineHandler(({ user_config }) => {
    const { query } = user_config;
    if (typeof query !== 'string') return failed('query must be a string');
    return completed({ query, metadata: { source: 'user_input' } });
}, ['query']);

export const lineChunker = defineHandler(({ user_config }) => {
    const { content } = user_config;
    if (typeof content !== 'string') return failed('content must be a string');
    const size = chunkSizeOf(user_config.chunk_size);
    if (typeof size === 'string') return failed(size);

    const chunks = packChunks(content.split(/\r?\n/), size, '\n');
    return completed({ chunks, total_chunks: chunks.length, content_length: content.length });
}, ['content']);

export const sentenceSplitter = defineHandler(({ user_config }) => {
    const { content } = user_config;
    if (typeof content !== 'string') return failed('content must be a string');
    const size = chunkSizeOf(user_config.chunk_size);
    if (typeof size === 'string') return failed(size);

    const chunks = packChunks(splitSentences(content), size, ' ');
    return completed({ chunks, total_chunks: chunks.length, content_length: content.length });
}, ['content']);

export function registerExampleHandlers(registry: HandlerRegistry): HandlerRegistry {
    return registry
        .register('user_input', userInput)
        .register('line_chunker', lineChunker)
        .register('sentence_splitter', sentenceSplitter);
}
