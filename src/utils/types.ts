export interface Position {
  line: number;
  column: number;
  offset: number;
}

/** Source span; `end` points one past the last character. */
export interface Location {
  start: Position;
  end: Position;
}

export interface FormatOptions {
  input?: string;
  useColors?: boolean;
}
