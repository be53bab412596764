import type { EmbeddingVector } from "../llm/types";

export type MetadataValue = string | number | boolean;

export interface PointPayload {
    text: string;
    filename: string;
    chunk_index: number;
    total_chunks: number;
    checksum: string;
    [key: string]: MetadataValue;
}

export interface IndexedPoint {
    id: string;
    vector: EmbeddingVector;
    payload: PointPayload;
}

export interface SearchHit {
    id: string;
    text: string;
    filename: string;
    chunk_index: number;
    total_chunks: number;
    score: number;
}

export interface SearchFilter {
    filename?: string;
}

export interface UpsertResult {
    storedCount: number;
}

export type CollectionStats =
    | {
          name: string;
          status: "ready";
          pointCount: number;
          vectorCount: number;
      }
    | {
          name: string;
          status: "error";
          error: string;
      };

export interface VectorIndex {
    readonly name: string;
    readonly dimension: number;

    /** Creates the collection (dimension D, cosine metric) when it does not exist yet. */
    ensureCollection(): Promise<void>;
    upsert(points: readonly IndexedPoint[]): Promise<UpsertResult>;
    search(queryVector: EmbeddingVector, topK: number, filter?: SearchFilter): Promise<SearchHit[]>;
    /** Resolves `true` once the delete completed, whether or not anything matched. */
    deleteByFilename(filename: string): Promise<boolean>;
    listDistinctFilenames(): Promise<string[]>;
    /** Never rejects: failures come back as a `status: "error"` payload. */
    collectionStats(): Promise<CollectionStats>;
    countByFilename(filename: string): Promise<number>;
    /** Removes the points of `filename` whose chunk_index is `>= totalChunks`. Returns how many went. */
    pruneChunks(filename: string, totalChunks: number): Promise<number>;
    close(): Promise<void>;
}
