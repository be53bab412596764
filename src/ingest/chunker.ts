import type { ChunkingStrategy } from "../config/types";
import { InvalidInputError } from "../errors";
import { normalizeWhitespace } from "./textCleaner";

export interface Chunk {
    text: string;
    index: number;
    totalChunks: number;
    sourceFilename: string;
}

export interface ChunkSpan {
    start: number;
    end: number;
}

export interface SplitOptions {
    strategy?: ChunkingStrategy;
    chunkSize?: number;
    overlap?: number;
}

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

const SENTENCE_TERMINATORS = [". ", "! ", "? "];

export function assertChunkParameters(chunkSize: number, overlap: number): void {
    if (!Number.isInteger(chunkSize) || !Number.isInteger(overlap)) {
        throw new InvalidInputError(`chunk_size and overlap must be integers, got ${chunkSize} and ${overlap}.`);
    }
    if (overlap < 0) {
        throw new InvalidInputError(`overlap must be >= 0, got ${overlap}.`);
    }
    if (chunkSize <= overlap) {
        throw new InvalidInputError(`chunk_size (${chunkSize}) must be greater than overlap (${overlap}).`);
    }
}

function findCutPoint(text: string, start: number, end: number, chunkSize: number): number {
    let sentenceEnd = -1;
    for (const terminator of SENTENCE_TERMINATORS) {
        // The whole terminator (mark + space) has to sit inside [start, end).
        const position = text.lastIndexOf(terminator, end - terminator.length);
        if (position >= start && position > sentenceEnd) {
            sentenceEnd = position;
        }
    }

    if (sentenceEnd > start + Math.floor(chunkSize / 2)) {
        return sentenceEnd + 1;
    }

    const space = text.lastIndexOf(" ", end - 1);
    if (space > start) {
        return space;
    }

    // No space inside the window. If none follows either, the rest is one unbroken word
    // and stays whole; otherwise hard-cut at the window edge.
    return text.indexOf(" ", end) === -1 ? text.length : end;
}

/**
 * Window offsets into `text` (assumed already whitespace-normalized). Consecutive spans
 * overlap by at most `overlap` characters and together cover the whole text.
 */
export function computeChunkSpans(text: string, chunkSize: number, overlap: number): ChunkSpan[] {
    assertChunkParameters(chunkSize, overlap);

    if (text.length === 0) {
        return [];
    }

    if (text.length <= chunkSize) {
        return [{ start: 0, end: text.length }];
    }

    const spans: ChunkSpan[] = [];
    let start = 0;

    while (start < text.length) {
        const windowEnd = start + chunkSize;
        const cut = windowEnd < text.length
            ? findCutPoint(text, start, windowEnd, chunkSize)
            : text.length;

        spans.push({ start, end: cut });

        if (cut >= text.length) {
            break;
        }

        const next = cut - overlap;
        start = next > start ? next : cut;
    }

    return spans;
}

/**
 * Splits text into overlapping chunks of at most `chunkSize` characters, preferring to
 * cut after a sentence terminator in the second half of the window, then at a space.
 */
export function chunkText(text: string, chunkSize = DEFAULT_CHUNK_SIZE, overlap = DEFAULT_CHUNK_OVERLAP): string[] {
    assertChunkParameters(chunkSize, overlap);

    const normalized = normalizeWhitespace(text);
    return computeChunkSpans(normalized, chunkSize, overlap)
        .map(({ start, end }) => normalized.slice(start, end).trim())
        .filter((chunk) => chunk.length > 0);
}

/**
 * Groups blank-line separated paragraphs into chunks no larger than `maxChunkSize`.
 * A paragraph that alone exceeds the bound goes through `chunkText`.
 */
export function chunkByParagraphs(text: string, maxChunkSize = DEFAULT_CHUNK_SIZE, overlap = 100): string[] {
    assertChunkParameters(maxChunkSize, overlap);

    const paragraphs = text
        .split(/\n\s*\n/)
        .map((paragraph) => normalizeWhitespace(paragraph))
        .filter((paragraph) => paragraph.length > 0);

    const chunks: string[] = [];
    let current: string[] = [];
    let currentSize = 0;

    const flush = () => {
        if (current.length === 0) return;
        chunks.push(current.join(" "));
        current = [];
        currentSize = 0;
    };

    for (const paragraph of paragraphs) {
        if (paragraph.length > maxChunkSize) {
            flush();
            chunks.push(...chunkText(paragraph, maxChunkSize, overlap));
            continue;
        }

        const joinedSize = currentSize + (current.length > 0 ? 1 : 0) + paragraph.length;
        if (joinedSize > maxChunkSize) {
            flush();
        }

        currentSize += (current.length > 0 ? 1 : 0) + paragraph.length;
        current.push(paragraph);
    }
    flush();

    return chunks;
}

/** Word-count windows: `wordsPerChunk` words per chunk, sliding by `wordsPerChunk - overlapWords`. */
export function chunkByWords(text: string, wordsPerChunk = 500, overlapWords = 50): string[] {
    assertChunkParameters(wordsPerChunk, overlapWords);

    const words = normalizeWhitespace(text).split(" ").filter(Boolean);
    const chunks: string[] = [];

    for (let start = 0; start < words.length; start += wordsPerChunk - overlapWords) {
        const end = Math.min(start + wordsPerChunk, words.length);
        chunks.push(words.slice(start, end).join(" "));
        if (end === words.length) break;
    }

    return chunks;
}

function chunkWithStrategy(strategy: ChunkingStrategy, text: string, chunkSize: number, overlap: number): string[] {
    switch (strategy) {
        case "sentence":
            return chunkText(text, chunkSize, overlap);
        case "paragraph":
            return chunkByParagraphs(text, chunkSize, overlap);
        case "words":
            return chunkByWords(text, chunkSize, overlap);
    }
}

export function splitDocument(filename: string, text: string, options: SplitOptions = {}): Chunk[] {
    const texts = chunkWithStrategy(
        options.strategy ?? "sentence",
        text,
        options.chunkSize ?? DEFAULT_CHUNK_SIZE,
        options.overlap ?? DEFAULT_CHUNK_OVERLAP
    );

    return texts.map((chunk, index) => ({
        text: chunk,
        index,
        totalChunks: texts.length,
        sourceFilename: filename,
    }));
}
