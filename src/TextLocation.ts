export interface TextLocation {
  index: number;
  line: number;
  column: number;
}

export const START_OF_TEXT: TextLocation = Object.freeze({ index: 0, line: 1, column: 1 });

/** Location reached after consuming `text` starting at `from`. */
export function advanceLocation(from: TextLocation, text: string): TextLocation {
  let { line, column } = from;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { index: from.index + text.length, line, column };
}

export function formatLocation(location: TextLocation): string {
  return `line ${location.line}, column ${location.column}`;
}
