import chalk from "chalk";
import type { Messages } from "../i18n/messages.js";
import { Note } from "../notes/note.js";
import { formatTimestamp } from "../notes/timestamp.js";
import type { NotebookView } from "../notes/types.js";

export class ConsoleNotebookView implements NotebookView {
  private messages: Messages;

  constructor(messages: Messages) {
    this.messages = messages;
  }

  displayNotes(notes: readonly Note[]): void {
    if (notes.length === 0) {
      console.log(chalk.yellow(this.messages.noNotes));
      return;
    }

    for (const note of notes) {
      console.log(`${chalk.cyan(formatTimestamp(note.timestamp))}: ${note.content}`);
    }
  }

  displayMessage(message: string): void {
    console.log(message);
  }
}
