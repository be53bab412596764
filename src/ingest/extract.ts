import path from "node:path";
import { InvalidInputError } from "../errors";
import { stripPageArtifacts } from "./textCleaner";

/** Maps an uploaded file to raw text. Format-specific parsers plug in here. */
export type TextExtractor = (filename: string, content: Uint8Array) => Promise<string>;

const UNSUPPORTED_BINARY_FORMATS = new Set([".pdf", ".docx", ".doc", ".pptx", ".xlsx"]);

export const extractPlainText: TextExtractor = async (filename, content) => {
    const extension = path.extname(filename).toLowerCase();

    if (UNSUPPORTED_BINARY_FORMATS.has(extension)) {
        throw new InvalidInputError(
            `Cannot extract text from "${filename}": ${extension} files need a format-specific extractor.`
        );
    }

    const decoded = new TextDecoder("utf-8", { fatal: false }).decode(content);
    return stripPageArtifacts(decoded);
};
