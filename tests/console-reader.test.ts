import { PassThrough, Writable } from "stream";
import { beforeEach, describe, expect, it } from "vitest";
import { ConsoleLineReader } from "../src/ui/console-reader.js";

describe("ConsoleLineReader", () => {
  let input: PassThrough;
  let written: string[];
  let reader: ConsoleLineReader;

  beforeEach(() => {
    input = new PassThrough();
    written = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        written.push(chunk.toString());
        callback();
      },
    });
    reader = new ConsoleLineReader(input, output);
  });

  it("splits one chunk into separate lines", async () => {
    input.write("add\n2024-09-24 19:00\nMeeting\n");

    expect(await reader.readLine("command:")).toBe("add");
    expect(await reader.readLine("date:")).toBe("2024-09-24 19:00");
    expect(await reader.readLine("text:")).toBe("Meeting");
  });

  it("writes each prompt on its own line", async () => {
    input.write("exit\n");
    await reader.readLine("command:");

    expect(written).toEqual(["command:\n"]);
  });

  it("waits for a line that has not arrived yet", async () => {
    const pending = reader.readLine("command:");
    input.write("save\n");

    expect(await pending).toBe("save");
  });

  it("reads CRLF input as plain lines", async () => {
    input.write("load\r\nexit\r\n");

    expect(await reader.readLine("command:")).toBe("load");
    expect(await reader.readLine("command:")).toBe("exit");
  });

  it("resolves null once the input ends", async () => {
    input.end("list\n");

    expect(await reader.readLine("command:")).toBe("list");
    expect(await reader.readLine("command:")).toBeNull();
    expect(await reader.readLine("command:")).toBeNull();
  });

  it("resolves a pending read with null when the input ends", async () => {
    const pending = reader.readLine("command:");
    input.end();

    expect(await pending).toBeNull();
  });

  it("reads nothing after close", async () => {
    reader.close();

    expect(await reader.readLine("command:")).toBeNull();
  });
});
