import type { NarrationResult } from '../types/Narration.js';

export const NARRATION_MARKER = '🎲';
export const WARNING_MARKER = '⚠️ ';

export interface ConsoleLike {
  log(message: string): void;
  warn(message: string): void;
}

/** Prints nothing for an absent narration. */
export function printNarration(text: NarrationResult, out: ConsoleLike = console): void {
  if (text === null) return;
  out.log(`\n${NARRATION_MARKER} ${text}\n`);
}

export function printWarning(message: string, out: ConsoleLike = console): void {
  out.warn(`${WARNING_MARKER} ${message}`);
}
