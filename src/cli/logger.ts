/**
 * Console logger for hookstamp
 *
 * Leveled messages go to stderr so stdout stays reserved for machine-readable
 * output (fingerprint lines, raw JSON). Use `raw` for anything that belongs
 * on stdout.
 */

import chalk from "chalk";

let silentMode = false;

/**
 * Enable or disable silent mode
 * In silent mode only errors and raw output are printed.
 * @param args - Configuration arguments
 * @param args.silent - Whether to suppress non-error output
 */
export const setSilentMode = (args: { silent: boolean }): void => {
  silentMode = args.silent;
};

export const red = (text: string): string => chalk.red(text);
export const green = (text: string): string => chalk.green(text);
export const yellow = (text: string): string => chalk.yellow(text);
export const gray = (text: string): string => chalk.gray(text);
export const brightCyan = (text: string): string => chalk.cyanBright(text);
export const boldWhite = (text: string): string => chalk.bold.white(text);

/**
 * Log an error message (never suppressed)
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const error = (args: { message: string }): void => {
  console.error(red(args.message));
};

/**
 * Log a warning message
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const warn = (args: { message: string }): void => {
  if (silentMode) return;
  console.error(yellow(args.message));
};

/**
 * Log an informational message
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const info = (args: { message: string }): void => {
  if (silentMode) return;
  console.error(brightCyan(args.message));
};

/**
 * Log a success message
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const success = (args: { message: string }): void => {
  if (silentMode) return;
  console.error(green(args.message));
};

/**
 * Log a debug message, only when HOOKSTAMP_DEBUG is set
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const debug = (args: { message: string }): void => {
  if (silentMode || process.env.HOOKSTAMP_DEBUG == null) return;
  console.error(gray(args.message));
};

/**
 * Print a blank line on stderr
 */
export const newline = (): void => {
  if (silentMode) return;
  console.error("");
};

/**
 * Print a message to stdout without formatting
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const raw = (args: { message: string }): void => {
  console.log(args.message);
};
