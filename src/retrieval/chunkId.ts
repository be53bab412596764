import crypto from "node:crypto";
import { v5 as uuidv5 } from "uuid";

// RFC 4122 DNS namespace; ids only need to be stable, not meaningful.
const CHUNK_ID_NAMESPACE = "6ba7b810-9dad-11d1-80b4-00c04fd430c8";

/**
 * Point id for chunk `index` of `filename`. Depends on position only, so re-ingesting a file
 * overwrites its previous points instead of adding new ones.
 */
export function chunkPointId(filename: string, index: number): string {
    return uuidv5(`${filename}_${index}`, CHUNK_ID_NAMESPACE);
}

/** sha256 of the chunk text, stored beside the point so a changed chunk can be told from an unchanged one. */
export function chunkChecksum(text: string): string {
    return crypto.createHash("sha256").update(text, "utf-8").digest("hex");
}
