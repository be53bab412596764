import { describe, expect, it } from "vitest";
import { normalizeWhitespace, stripPageArtifacts } from "./textCleaner";

describe("normalizeWhitespace", () => {
    it("collapses runs of whitespace, including newlines, and trims", () => {
        expect(normalizeWhitespace("  a\n\n b\t\tc  ")).toBe("a b c");
    });
});

describe("stripPageArtifacts", () => {
    it("drops page numbers, bare numbers and publishing boilerplate", () => {
        const text = [
            "Page 12",
            "Photosynthesis converts light",
            "into chemical energy.",
            "42",
            "Copyright (c) 2020 Example Press",
            "ISBN: 978-0-00-000000-0",
            "",
            "Chapter 3",
            "Plants store energy as starch.",
            "ok",
        ].join("\n");

        expect(stripPageArtifacts(text)).toBe(
            "Photosynthesis converts light into chemical energy.\n\nPlants store energy as starch."
        );
    });

    it("drops lines that start with a date", () => {
        expect(stripPageArtifacts("03/14/2024 printed copy\nActual content line")).toBe("Actual content line");
    });

    it("keeps chapter headings that carry a title", () => {
        expect(stripPageArtifacts("Chapter 3 Energy")).toBe("Chapter 3 Energy");
    });

    it("returns an empty string for empty input", () => {
        expect(stripPageArtifacts("")).toBe("");
    });
});
