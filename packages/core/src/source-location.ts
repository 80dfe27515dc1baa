// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * Position of a character in an input source.
 * `offset` counts characters delivered from the source, starting at 0.
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}
