import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Note } from "../src/notes/note.js";
import type { LineReader, NotebookView } from "../src/notes/types.js";

export class RecordingView implements NotebookView {
  readonly messages: string[] = [];
  readonly noteLists: string[][] = [];

  displayNotes(notes: readonly Note[]): void {
    this.noteLists.push(notes.map((note) => note.toString()));
  }

  displayMessage(message: string): void {
    this.messages.push(message);
  }
}

/** Feeds canned lines to the loop; returns null once they run out. */
export class ScriptedLineReader implements LineReader {
  readonly prompts: string[] = [];
  closed = false;
  private lines: string[];

  constructor(lines: string[]) {
    this.lines = [...lines];
  }

  async readLine(message: string): Promise<string | null> {
    this.prompts.push(message);
    return this.lines.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }
}

export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "daybook-test-"));
  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
