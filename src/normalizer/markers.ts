/**
 * Comment markers recognised and emitted by the normalizer.
 *
 * IMPORTANT:
 *  - LINE_COMMENT_MARKER is matched anywhere on a line, string literals included.
 *  - The block pieces are emitted verbatim after the indent prefix.
 */
export const LINE_COMMENT_MARKER = "//";

export const BLOCK_COMMENT = {
    open: "/*",             // first line of a grouped run
    linePrefix: " * ",      // one per grouped comment
    close: " */",           // last line of a grouped run
    inlineOpen: "/* ",      // standalone comment
    inlineClose: " */"
} as const;
