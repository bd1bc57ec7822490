export class TimestampParseError extends Error {
  readonly text: string;

  constructor(text: string) {
    super(`Text '${text}' could not be parsed as a timestamp (expected YYYY-MM-DD HH:MM)`);
    this.name = "TimestampParseError";
    this.text = text;
  }
}

// Wraps filesystem failures so callers can tell them apart from parse errors
export class NoteStorageError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NoteStorageError";
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
