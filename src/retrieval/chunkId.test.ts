import { describe, expect, it } from "vitest";
import { chunkChecksum, chunkPointId } from "./chunkId";

describe("chunkPointId", () => {
    it("derives a name-based UUID from filename and chunk index", () => {
        expect(chunkPointId("notes.txt", 0)).toBe("b61002c2-81a0-549e-880d-d1d1be08ce85");
        expect(chunkPointId("notes.txt", 1)).toBe("aea37b27-bf5e-5c4a-b166-3bb6cf8bc3ff");
        expect(chunkPointId("report.md", 3)).toBe("dcf9dd1b-d9fc-5bd5-bde3-d48e02a6e51f");
    });

    it("is stable across calls", () => {
        expect(chunkPointId("notes.txt", 7)).toBe(chunkPointId("notes.txt", 7));
    });
});

describe("chunkChecksum", () => {
    it("returns the sha256 hex digest of the chunk text", () => {
        expect(chunkChecksum("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
    });
});
