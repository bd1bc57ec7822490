import { formatTimestamp } from "./timestamp.js";

export class Note {
  private readonly time: number;
  readonly content: string;

  constructor(timestamp: Date, content: string) {
    this.time = timestamp.getTime();
    this.content = content;
  }

  // Fresh Date each call; the note itself never changes
  get timestamp(): Date {
    return new Date(this.time);
  }

  toString(): string {
    return `${formatTimestamp(this.timestamp)}: ${this.content}`;
  }
}
