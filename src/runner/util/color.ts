/* src/runner/util/color.ts
 * Meaning-based color helpers.
 * Respects AGENT_CONSOLE_BORING, NO_COLOR and FORCE_COLOR.
 * BORING or non‑TTY => return unstyled strings.
 */
import chalk from 'chalk';

export function isBoring(): boolean {
  // Compute TTY dynamically so tests and callers can toggle isTTY/env reliably.
  const tty = Boolean(process.stdout.isTTY);
  return (
    process.env.AGENT_CONSOLE_BORING === '1' ||
    process.env.NO_COLOR === '1' ||
    process.env.FORCE_COLOR === '0' ||
    !tty
  );
}

/** Semantic aliases (unstyled in BORING/non‑TTY) */
export function ok(s: string): string {
  return isBoring() ? s : chalk.green(s);
}
export function alert(s: string): string {
  return isBoring() ? s : chalk.cyan(s);
}
export function agent(s: string): string {
  return isBoring() ? s : chalk.magenta(s);
}
export function user(s: string): string {
  return isBoring() ? s : chalk.blue(s);
}
export function error(s: string): string {
  return isBoring() ? s : chalk.red(s);
}
export function warn(s: string): string {
  return isBoring() ? s : chalk.hex('#FFA500')(s);
} // orange

export function dim(s: string): string {
  return isBoring() ? s : chalk.dim(s);
}
