import { NoteStorageError } from "../errors.js";
import type { Messages } from "../i18n/messages.js";
import { type Logger, silentLogger } from "../logger.js";
import { Note } from "./note.js";
import { Notebook } from "./notebook.js";
import { parseTimestamp } from "./timestamp.js";
import type { NotebookPresenter, NotebookView } from "./types.js";

export interface PresenterOptions {
  notesFile: string;
  messages: Messages;
  logger?: Logger;
}

export class NotebookPresenterImpl implements NotebookPresenter {
  private view: NotebookView;
  private notebook: Notebook;
  private notesFile: string;
  private messages: Messages;
  private logger: Logger;

  constructor(view: NotebookView, notebook: Notebook, options: PresenterOptions) {
    this.view = view;
    this.notebook = notebook;
    this.notesFile = options.notesFile;
    this.messages = options.messages;
    this.logger = options.logger ?? silentLogger;
  }

  /** Throws TimestampParseError for a malformed date; nothing is added then. */
  addNote(dateText: string, content: string): void {
    const timestamp = parseTimestamp(dateText);
    this.notebook.add(new Note(timestamp, content));
    this.logger.info(`Added note for ${dateText}`);
    this.view.displayMessage(this.messages.noteAdded);
  }

  // Storage failures are reported to the view; parse errors from the file propagate
  loadNotes(): void {
    try {
      this.notebook.loadFrom(this.notesFile);
    } catch (error) {
      if (!(error instanceof NoteStorageError)) {
        throw error;
      }
      this.logger.error(`Loading ${this.notesFile} failed`, error);
      this.view.displayMessage(this.messages.loadFailed(error.message));
      return;
    }

    this.logger.info(`Loaded notes from ${this.notesFile}`);
    this.view.displayNotes(this.notebook.getNotes());
  }

  saveNotes(): void {
    try {
      this.notebook.saveTo(this.notesFile);
    } catch (error) {
      if (!(error instanceof NoteStorageError)) {
        throw error;
      }
      this.logger.error(`Saving ${this.notesFile} failed`, error);
      this.view.displayMessage(this.messages.saveFailed(error.message));
      return;
    }

    this.logger.info(`Saved notes to ${this.notesFile}`);
    this.view.displayMessage(this.messages.notesSaved);
  }

  getNotes(): readonly Note[] {
    return this.notebook.getNotes();
  }

  getNotesForDay(day: Date): Note[] {
    return this.notebook.getNotesForDay(day);
  }

  getNotesForWeek(startOfWeek: Date): Note[] {
    return this.notebook.getNotesForWeek(startOfWeek);
  }
}
