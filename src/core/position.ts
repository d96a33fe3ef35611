/**
 * A location in the original, untemplated source
 */
export interface PositionMarker {
  /** Segment the position belongs to, when one is known */
  readonly segmentOwner: string | null;
  /** 1-based line number */
  readonly line: number;
  /** 1-based column */
  readonly column: number;
  /** Characters before the line (newlines included) plus the column */
  readonly absoluteOffset: number;
}

/**
 * Create an immutable position marker
 */
export function createPositionMarker(
  line: number,
  column: number,
  absoluteOffset: number,
  segmentOwner: string | null = null
): PositionMarker {
  return Object.freeze({ segmentOwner, line, column, absoluteOffset });
}

/**
 * Locate an identifier on a given line of the source.
 *
 * The column is the first occurrence of the identifier text on that line, so an
 * earlier occurrence inside another token or a string literal wins. Positions refer
 * to the source before rendering and will not line up with rendered output.
 *
 * @param source Original template source
 * @param line 1-based line the identifier was found on
 * @param identifier Identifier text to search for
 */
export function locateIdentifier(source: string, line: number, identifier: string): PositionMarker {
  const lines = source.split("\n");
  const text = lines[line - 1] ?? "";
  const column = Math.max(text.indexOf(identifier), 0) + 1;

  let preceding = 0;
  for (const previous of lines.slice(0, line - 1)) {
    preceding += previous.length + 1;
  }

  return createPositionMarker(line, column, preceding + column);
}
