import { describe, expect, it } from "vitest";
import { mergeLimits, resolveBaseUrl, toRequestBatches } from "./providerUtils";

describe("providerUtils", () => {
    it("adds a trailing slash to custom base URLs", () => {
        expect(resolveBaseUrl("http://localhost:8080/v1", "https://default/")).toBe("http://localhost:8080/v1/");
        expect(resolveBaseUrl(undefined, "https://default/")).toBe("https://default/");
    });

    it("overrides only the limits that are set", () => {
        expect(mergeLimits({ batchSize: 10, retries: 3 }, { retries: 0, concurrency: undefined })).toEqual({
            batchSize: 10,
            retries: 0,
        });
    });

    it("groups texts into indexed request batches", () => {
        expect(toRequestBatches(["a", "b", "c", "d", "e"], 2)).toEqual([
            { idx: 0, batch: ["a", "b"] },
            { idx: 1, batch: ["c", "d"] },
            { idx: 2, batch: ["e"] },
        ]);
        expect(toRequestBatches(["a"], 0)).toEqual([{ idx: 0, batch: ["a"] }]);
    });
});
