import type { Messages } from "./i18n/messages.js";
import { type Logger, silentLogger } from "./logger.js";
import { parseDay } from "./notes/timestamp.js";
import type { LineReader, NotebookPresenter, NotebookView } from "./notes/types.js";

export interface NotebookLoopOptions {
  presenter: NotebookPresenter;
  view: NotebookView;
  reader: LineReader;
  messages: Messages;
  logger?: Logger;
}

/** Marks end of input at any prompt; the loop then exits as if `exit` was typed. */
class EndOfInput extends Error {
  constructor() {
    super("end of input");
    this.name = "EndOfInput";
  }
}

/**
 * Runs the interactive command loop until `exit` or end of input.
 *
 * Only load/save handle their own errors. A malformed date typed for
 * `add`, `day` or `week` rejects the returned promise, and the caller is
 * expected to end the process.
 */
export async function runNotebookLoop(options: NotebookLoopOptions): Promise<void> {
  const { presenter, view, reader, messages } = options;
  const logger = options.logger ?? silentLogger;

  const read = async (message: string): Promise<string> => {
    const line = await reader.readLine(message);
    if (line === null) {
      throw new EndOfInput();
    }
    return line;
  };

  try {
    while (true) {
      const command = await read(messages.commandPrompt);
      logger.debug(`Command: ${command}`);

      switch (command) {
        case "add": {
          const date = await read(messages.datePrompt);
          const content = await read(messages.contentPrompt);
          presenter.addNote(date, content);
          break;
        }
        case "load":
          presenter.loadNotes();
          break;
        case "save":
          presenter.saveNotes();
          break;
        case "day": {
          const day = parseDay(await read(messages.dayPrompt));
          view.displayNotes(presenter.getNotesForDay(day));
          break;
        }
        case "week": {
          const weekStart = parseDay(await read(messages.weekPrompt));
          view.displayNotes(presenter.getNotesForWeek(weekStart));
          break;
        }
        case "exit":
          view.displayMessage(messages.farewell);
          return;
        default:
          view.displayMessage(messages.unknownCommand);
      }
    }
  } catch (error) {
    if (!(error instanceof EndOfInput)) {
      throw error;
    }
    logger.debug("Input closed");
    view.displayMessage(messages.farewell);
  } finally {
    reader.close();
  }
}
