// File: `src/normalizer/normalizeLineComments.ts`

import { BLOCK_COMMENT } from "./markers";
import { detectLineComment } from "./detectLineComment";
import { splitLines } from "./splitLines";

/**
 * This module rewrites `//` line comments as `/* *\/` block comments.
 *
 * The scan walks the lines once, looking one line ahead:
 *  - a run of two or more comment lines collapses into one block,
 *    one ` * text` line per original comment
 *  - an isolated comment line becomes an inline `/* text *\/`,
 *    keeping the code that preceded the marker
 *  - every other line is copied as is
 *
 * Design invariants:
 *  - every input line produces at least one output line
 *  - a block opened by the scan is closed before a non-comment line
 *    is emitted and before the scan ends
 *  - the indent width of a block is fixed at the line that opened it
 */

/**
 * State carried from one line to the next.
 */
type ScanState = {
    /**
     * True while a block comment has been opened and not yet closed.
     */
    blockMode: boolean;

    /**
     * Number of spaces prefixed to emitted comment lines.
     *
     * Refreshed from each line while outside a block, frozen inside one.
     */
    indentWidth: number;
};

/**
 * Rewrite the line comments of `lines` and return the output lines,
 * without terminators.
 */
export function normalizeLineComments(lines: readonly string[]): string[] {
    const out: string[] = [];
    const state: ScanState = { blockMode: false, indentWidth: 0 };

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        const detection = detectLineComment(line);

        if (!state.blockMode) {
            state.indentWidth = detection.hasComment ? detection.indentWidth : 0;
        }

        if (!detection.hasComment) {
            out.push(line);
            continue;
        }

        const isCommentNext =
            i + 1 < lines.length && detectLineComment(lines[i + 1]).hasComment;
        const indent = " ".repeat(state.indentWidth);

        if (!state.blockMode && isCommentNext) {
            out.push(indent + BLOCK_COMMENT.open);
            state.blockMode = true;
        }

        if (state.blockMode) {
            out.push(indent + BLOCK_COMMENT.linePrefix + detection.commentText);

            if (!isCommentNext) {
                out.push(indent + BLOCK_COMMENT.close);
                state.blockMode = false;
            }
            continue;
        }

        out.push(
            indent +
            renderInlineComment(detection.codeBeforeComment, detection.commentText)
        );
    }

    return out;
}

/**
 * Rewrite the line comments of a whole source text.
 *
 * Every output line is terminated with `\n`, whatever the input used.
 */
export function normalizeSource(text: string): string {
    return normalizeLineComments(splitLines(text))
        .map(line => `${line}\n`)
        .join("");
}

// ======================================================
// Output helpers
// ======================================================

function renderInlineComment(code: string, commentText: string): string {
    const comment =
        BLOCK_COMMENT.inlineOpen + commentText + BLOCK_COMMENT.inlineClose;

    return code ? `${code} ${comment}` : comment;
}
