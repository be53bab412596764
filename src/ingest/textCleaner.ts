const ARTIFACT_PATTERNS: RegExp[] = [
    /^\s*page\s+\d+/i,
    /^\s*\d+\s*$/,
    /copyright\s+(©|\(c\))/i,
    /isbn[:\s]*[\d-]+/i,
    /blind\s+folio/i,
    /^\s*\d{2}[-/]\d{2}[-/]\d{2,4}/,
    /^\s*chapter\s+\d+\s*$/i,
    /^\s*section\s+\d+\s*$/i,
];

const MIN_LINE_LENGTH = 3;

export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/**
 * Drops lines that look like extraction debris (page numbers, ISBNs, copyright notices,
 * bare chapter markers, one- and two-character lines). Lines within a paragraph are
 * joined with spaces; blank-line paragraph breaks survive as "\n\n".
 */
export function stripPageArtifacts(text: string): string {
    if (!text) {
        return "";
    }

    const paragraphs: string[] = [];
    let current: string[] = [];

    const flush = () => {
        if (current.length === 0) return;
        paragraphs.push(normalizeWhitespace(current.join(" ")));
        current = [];
    };

    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (line.length === 0) {
            flush();
            continue;
        }
        if (line.length < MIN_LINE_LENGTH || ARTIFACT_PATTERNS.some((pattern) => pattern.test(line))) {
            continue;
        }
        current.push(line);
    }
    flush();

    return paragraphs.join("\n\n");
}
