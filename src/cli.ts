#!/usr/bin/env -S npx tsx

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import * as ebook from './ebook/mod.ts';
import { errorMessage } from './errors.ts';
import { ConsoleListener, events, LogListener } from './events/mod.ts';
import { DEFAULT_LOG_DIR, Logger } from './logger/mod.ts';
import { createKeyHandler, loadBook } from './reader/mod.ts';
import type { Book } from './reader/mod.ts';
import { loadSession, saveSession, sessionFileName } from './session/mod.ts';
import { TerminalScreen } from './ui/mod.ts';
import type { Screen } from './ui/mod.ts';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const HELP_TEXT = `
folio - Read EPUB books in the terminal

USAGE:
    folio <book.epub> [options]

OPTIONS:
    --log-dir <dir>    Directory for folio.log (default: ~/.folio/logs)
    -h, --help         Show this help

KEYS:
    l / h              Next / previous chapter
    /                  Toggle the table of contents
    j / k, Down / Up   Scroll a line, or move in the table of contents
    PgDn / PgUp        Scroll a page (also Ctrl-F / Ctrl-B)
    Home / End         Go to the start / end (also g / G)
    Enter              Open the chapter selected in the table of contents
    m / '              Set the mark / jump to the mark
    space              Scroll forward
    + / - / =          Widen / narrow / reset the text column
    q, Ctrl-C          Quit and save the session

EXAMPLES:
    folio book.epub
    folio book.epub --log-dir ./logs
`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'read'; inputFile: string; logDir: string };

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        help: { type: 'boolean', short: 'h' },
        'log-dir': { type: 'string' },
      },
    });
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseRawArgs(argv);
  if (values.help) {
    return { kind: 'help' };
  }

  const [inputFile, ...extra] = positionals;
  if (!inputFile) {
    throw new UsageError('Input file is required');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  return { kind: 'read', inputFile, logDir: values['log-dir'] ?? DEFAULT_LOG_DIR };
}

export interface MainOptions {
  /** Builds the screen; `onError` receives failures of queued updates. */
  createScreen?: (onError: (error: unknown) => void) => Screen;
}

function createTerminalScreen(onError: (error: unknown) => void): Screen {
  return new TerminalScreen({ onError });
}

async function read(inputFile: string, createScreen: NonNullable<MainOptions['createScreen']>): Promise<number> {
  const document = await ebook.open(inputFile);

  try {
    const sessionFile = sessionFileName(inputFile);
    const session = await loadSession(inputFile);
    events.emit({ type: 'session:load', sessionFile, found: session !== undefined });

    const screenErrors: unknown[] = [];
    const screen = createScreen((error) => {
      screenErrors.push(error);
      screen.stop();
    });

    let book: Book;
    try {
      book = await loadBook(document, screen, { session });
    } catch (error) {
      screen.stop();
      throw error;
    }

    await screen.run(createKeyHandler(book, () => screen.stop()));

    const state = book.snapshot();
    try {
      await saveSession(inputFile, state);
    } catch (error) {
      events.emit({ type: 'session:save:failed', sessionFile, error });
      return EXIT_FAILURE;
    }

    events.emit({ type: 'session:save', sessionFile, page: state.page });

    // The position is saved, but a broken screen is still a failed run
    if (screenErrors.length > 0) {
      throw screenErrors[0];
    }
    return EXIT_OK;
  } finally {
    await document.close();
  }
}

export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) {
      throw error;
    }
    console.error(`Error: ${error.message}`);
    console.error('Use --help for usage information');
    return EXIT_USAGE;
  }

  if (command.kind === 'help') {
    console.log(HELP_TEXT);
    return EXIT_OK;
  }

  const logger = await Logger.getInstance(command.logDir);
  const logListener = new LogListener(logger);
  const consoleListener = new ConsoleListener();
  const unsubscribeLog = events.subscribe((event) => logListener.listen(event));
  const unsubscribeConsole = events.subscribe((event) => consoleListener.listen(event));

  try {
    return await read(command.inputFile, options.createScreen ?? createTerminalScreen);
  } catch (error) {
    logger.error(`Failed to read ${command.inputFile}`, error);
    console.error(`Error: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  } finally {
    unsubscribeConsole();
    unsubscribeLog();
    await logger.close();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  process.exit(await main(process.argv.slice(2)));
}
