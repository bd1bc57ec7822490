import { readFileSync, writeFileSync } from "fs";
import { NoteStorageError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import { Note } from "./note.js";
import { addDays, formatTimestamp, parseTimestamp } from "./timestamp.js";
import { FIELD_SEPARATOR } from "./types.js";

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Notebook {
  private notes: Note[] = [];
  private logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  add(note: Note): void {
    this.notes.push(note);
  }

  /** All notes in insertion order. */
  getNotes(): readonly Note[] {
    return this.notes;
  }

  getNotesForDay(day: Date): Note[] {
    return this.filterNotes(day, addDays(day, 1));
  }

  getNotesForWeek(startOfWeek: Date): Note[] {
    return this.filterNotes(startOfWeek, addDays(startOfWeek, 7));
  }

  // Both bounds are exclusive: a note at exactly midnight belongs to neither day
  private filterNotes(start: Date, end: Date): Note[] {
    const from = start.getTime();
    const to = end.getTime();

    return this.notes
      .filter((note) => {
        const time = note.timestamp.getTime();
        return time > from && time < to;
      })
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  saveTo(filePath: string): void {
    const body = this.notes
      .map((note) => formatTimestamp(note.timestamp) + FIELD_SEPARATOR + note.content + "\n")
      .join("");

    try {
      writeFileSync(filePath, body, "utf-8");
    } catch (error) {
      throw new NoteStorageError(describeError(error), filePath, { cause: error });
    }

    this.logger.debug(`Saved ${this.notes.length} notes to ${filePath}`);
  }

  /**
   * Replaces the collection with the notes stored at `filePath`. Lines that do
   * not split into exactly two fields are skipped, so a trailing `;` after
   * the content drops the line. A bad timestamp on a two-field line aborts
   * the load and leaves the notebook empty.
   */
  loadFrom(filePath: string): void {
    this.notes = [];

    let raw: string;
    try {
      raw = readFileSync(filePath, "utf-8");
    } catch (error) {
      throw new NoteStorageError(describeError(error), filePath, { cause: error });
    }

    const loaded: Note[] = [];
    let skipped = 0;

    raw.split(/\r?\n/).forEach((line, index) => {
      const fields = line.split(FIELD_SEPARATOR);
      if (fields.length !== 2) {
        // The empty string after the final newline lands here too
        if (line !== "") {
          skipped++;
          this.logger.warn(`Skipped line ${index + 1} of ${filePath}: expected 2 fields, found ${fields.length}`);
        }
        return;
      }
      loaded.push(new Note(parseTimestamp(fields[0]), fields[1]));
    });

    this.notes = loaded;
    this.logger.debug(`Loaded ${loaded.length} notes from ${filePath} (${skipped} malformed lines skipped)`);
  }
}
