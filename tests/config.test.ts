import { homedir } from "os";
import { join, resolve } from "path";
import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, expandPath, getLogFilePath, getNotesFilePath, resolveConfig } from "../src/config/index.js";
import { ConfigError } from "../src/errors.js";
import { getMessages } from "../src/i18n/messages.js";

describe("resolveConfig", () => {
  it("defaults to notes.txt and Russian messages", () => {
    expect(DEFAULT_CONFIG).toEqual({ notesFile: "notes.txt", locale: "ru", verbose: false });
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("fills in options left undefined", () => {
    const config = resolveConfig({ notesFile: undefined, locale: "en", logFile: undefined, verbose: true });
    expect(config).toEqual({ notesFile: "notes.txt", locale: "en", verbose: true });
  });

  it("rejects an unsupported locale", () => {
    expect(() => resolveConfig({ locale: "de" })).toThrow(ConfigError);
    expect(() => resolveConfig({ locale: "de" })).toThrow(/^Invalid options: locale: /);
  });

  it("rejects an empty notes file path", () => {
    expect(() => resolveConfig({ notesFile: "" })).toThrow(/notesFile/);
  });
});

describe("paths", () => {
  it("resolves the notes file against the working directory", () => {
    expect(getNotesFilePath(DEFAULT_CONFIG)).toBe(resolve("notes.txt"));
  });

  it("expands the home directory", () => {
    expect(expandPath("~/notes.txt")).toBe(join(homedir(), "notes.txt"));
    expect(expandPath("$HOME/notes.txt")).toBe(join(homedir(), "notes.txt"));
  });

  it("has no log file unless one is configured", () => {
    expect(getLogFilePath(DEFAULT_CONFIG)).toBeUndefined();
    expect(getLogFilePath({ ...DEFAULT_CONFIG, logFile: "~/daybook.log" })).toBe(join(homedir(), "daybook.log"));
  });
});

describe("getMessages", () => {
  it("formats failure details into the message", () => {
    expect(getMessages("ru").saveFailed("disk full")).toBe("Ошибка сохранения записей: disk full");
    expect(getMessages("en").loadFailed("disk full")).toBe("Failed to load notes: disk full");
  });
});
