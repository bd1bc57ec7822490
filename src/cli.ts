#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync } from "fs";
import { resolveConfig, getNotesFilePath, getLogFilePath } from "./config/index.js";
import { getMessages } from "./i18n/messages.js";
import { createLogger } from "./logger.js";
import { Notebook } from "./notes/notebook.js";
import { NotebookPresenterImpl } from "./notes/presenter.js";
import { runNotebookLoop } from "./repl.js";
import { ConsoleNotebookView } from "./ui/console-view.js";
import { ConsoleLineReader } from "./ui/console-reader.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json (one level up from both src/ and dist/)
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

interface CliOptions {
  file?: string;
  locale?: string;
  logFile?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name("daybook")
  .description("Keep timestamped notes in a flat file and browse them by day or week")
  .version(packageJson.version)
  .option("-f, --file <path>", "Notes file", "notes.txt")
  .option("-l, --locale <locale>", "Message language (ru, en)", "ru")
  .option("--log-file <path>", "Append a log of notebook activity to this file")
  .option("-v, --verbose", "Echo debug log lines to stderr")
  .action(async (options: CliOptions) => {
    const config = resolveConfig({
      notesFile: options.file,
      locale: options.locale,
      logFile: options.logFile,
      verbose: options.verbose ?? false,
    });

    const messages = getMessages(config.locale);
    const logger = createLogger({ logFile: getLogFilePath(config), verbose: config.verbose });
    const notesFile = getNotesFilePath(config);

    const notebook = new Notebook(logger);
    const view = new ConsoleNotebookView(messages);
    const presenter = new NotebookPresenterImpl(view, notebook, { notesFile, messages, logger });

    logger.info(`Session started, notes file ${notesFile}`);

    try {
      await runNotebookLoop({
        presenter,
        view,
        reader: new ConsoleLineReader(),
        messages,
        logger,
      });
    } catch (error) {
      logger.error("Session aborted", error);
      const detail = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(messages.fatalError(detail)));
      process.exit(1);
    }

    logger.info("Session ended");
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
