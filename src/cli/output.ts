/**
 * Terminal output for the facetkit CLI.
 *
 * Status lines carry a one-character marker; detail rows are indented with their
 * labels padded to a fixed column. Colour codes are only emitted on a TTY.
 */

/* eslint-disable no-console */

const isTTY = process.stdout.isTTY ?? false;

const LABEL_WIDTH = 20;
const DIVIDER_WIDTH = 40;

type Color = 'reset' | 'bold' | 'dim' | 'red' | 'green' | 'yellow' | 'cyan';

const ANSI: Record<Color, string> = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

function paint(color: Color, text: string): string {
  return isTTY ? `${ANSI[color]}${text}${ANSI.reset}` : text;
}

function marked(color: Color, marker: string, message: string): string {
  return `${paint(color, marker)} ${message}`;
}

function row(label: string, labelColor: Color, value: string): string {
  return `  ${paint(labelColor, label.padEnd(LABEL_WIDTH))} ${value}`;
}

export const output = {
  success(message: string): void {
    console.log(marked('green', '✓', message));
  },

  warn(message: string): void {
    console.log(marked('yellow', '⚠', message));
  },

  /**
   * Print a failure to stderr, with the underlying message indented below it.
   */
  error(message: string, details?: string): void {
    console.error(marked('red', '✗', message));
    if (details) {
      console.error(`  ${paint('dim', details)}`);
    }
  },

  header(title: string): void {
    console.log(`\n${paint('bold', title)}`);
  },

  divider(): void {
    console.log(paint('dim', '─'.repeat(DIVIDER_WIDTH)));
  },

  stat(label: string, value: string | number): void {
    console.log(row(label, 'dim', String(value)));
  },

  /** Capability on/off row */
  flag(label: string, enabled: boolean): void {
    console.log(row(label, 'reset', enabled ? paint('green', 'enabled') : paint('dim', 'disabled')));
  },

  /** Appender name and where it writes */
  appender(name: string, description: string): void {
    console.log(row(name, 'cyan', description));
  },

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  },
};
