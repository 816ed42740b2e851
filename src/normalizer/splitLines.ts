/**
 * Split source text into lines with their terminators removed.
 *
 * `\n`, `\r\n` and a lone `\r` all end a line. A terminator at the very end
 * of the text does not open another (empty) line, so "" gives [] and
 * "a\n" gives ["a"].
 */
export function splitLines(text: string): string[] {
    if (text === "") return [];

    const lines = text.split(/\r\n|\n|\r/);

    if (lines[lines.length - 1] === "") {
        lines.pop();
    }

    return lines;
}
