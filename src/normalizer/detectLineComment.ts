import { LINE_COMMENT_MARKER } from "./markers";

/**
 * Result of looking for a line comment on a single source line.
 */
export type LineCommentDetection =
    | { hasComment: false }
    | {
          hasComment: true;

          /**
           * Everything after the marker, leading whitespace removed.
           */
          commentText: string;

          /**
           * Everything before the marker, trailing whitespace removed.
           * Empty when the comment is alone on its line.
           */
          codeBeforeComment: string;

          /**
           * Width of the whitespace between the code and the marker.
           *
           * NOTE:
           * This is the trailing whitespace of the pre-marker text, not the
           * leading indentation of the line. `int x = 1;   // note` gives 3,
           * `    // note` gives 4.
           */
          indentWidth: number;
      };

export function detectLineComment(line: string): LineCommentDetection {
    const markerAt = line.indexOf(LINE_COMMENT_MARKER);

    if (markerAt === -1) {
        return { hasComment: false };
    }

    const codePrefix = line.slice(0, markerAt);
    const codeBeforeComment = codePrefix.trimEnd();

    return {
        hasComment: true,
        commentText: line.slice(markerAt + LINE_COMMENT_MARKER.length).trimStart(),
        codeBeforeComment,
        indentWidth: codePrefix.length - codeBeforeComment.length
    };
}
