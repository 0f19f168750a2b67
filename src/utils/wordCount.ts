const FRONT_MATTER = /^---\r?\n[\s\S]*?\r?\n---\r?\n?/;
const HEADINGS = /^#{1,6}\s+.*$/gm;
const CODE_FENCES = /```[\s\S]*?```/g;
const WORD = /[\p{L}\p{N}_]+(?:['’][\p{L}\p{N}_]+)*/gu;

export function stripFrontMatter(text: string): string {
    return text.replace(FRONT_MATTER, '');
}

export function withFrontMatter(fields: Record<string, string | number | boolean>, body: string): string {
    const lines = Object.entries(fields)
        .map(([key, value]) => `${key}: ${typeof value === 'string' ? JSON.stringify(value) : value}`);
    return `---\n${lines.join('\n')}\n---\n\n${body}`;
}

/**
 * Prose word count: front matter, markdown headings and fenced code are not
 * part of the text.
 */
export function countWords(text: string): number {
    const prose = stripFrontMatter(text)
        .replace(CODE_FENCES, ' ')
        .replace(HEADINGS, ' ');
    return prose.match(WORD)?.length ?? 0;
}

/** Leading `limit` whitespace-separated words, original line breaks kept. */
export function firstWords(text: string, limit: number): string {
    const token = /\S+/g;
    let end = 0;
    for (let count = 0; count < limit; count++) {
        const match = token.exec(text);
        if (!match) break;
        end = match.index + match[0].length;
    }
    return text.slice(0, end).trim();
}
