// Malformed grid handed to the search; the caller's fault, never retried.
export class InvalidGridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidGridError";
  }
}

// Raised by pop() on an empty frontier. The engine turns it into "Exhausted".
export class EmptyFrontierError extends Error {
  constructor() {
    super("empty frontier");
    this.name = "EmptyFrontierError";
  }
}

export class MazeFormatError extends Error {
  readonly line: number | null;

  constructor(message: string, line: number | null = null) {
    super(line === null ? message : `line ${line}: ${message}`);
    this.name = "MazeFormatError";
    this.line = line;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
