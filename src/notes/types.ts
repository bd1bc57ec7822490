import type { Note } from "./note.js";

export const FIELD_SEPARATOR = ";";

export interface NotebookView {
  displayNotes(notes: readonly Note[]): void;
  displayMessage(message: string): void;
}

export interface NotebookPresenter {
  addNote(dateText: string, content: string): void;
  loadNotes(): void;
  saveNotes(): void;
  getNotes(): readonly Note[];
  getNotesForDay(day: Date): Note[];
  getNotesForWeek(startOfWeek: Date): Note[];
}

export interface LineReader {
  /** Resolves to null once input is exhausted or the reader is closed. */
  readLine(message: string): Promise<string | null>;
  close(): void;
}
