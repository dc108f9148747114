import type { TextUnit } from "../types.js";
import type { SplitStrategy } from "./types.js";

// "Figure 3.", "Fig. 3.", "Table 2.", "Figura 1.", "Tabla 4."
const CAPTION = /^(?:Figure|Figura|Fig\.?|Table|Tabla)\s*\d+\./i;

// A reference-list entry: optional "12." prefix, anything, then "(2019)" and an optional period.
const BARE_CITATION = /^(?:\d+\.\s*)?[\s\S]*\(\d{4}\)\.?$/;

export function isCaption(unit: string): boolean {
  return CAPTION.test(unit.trim());
}

export function isBareCitation(unit: string): boolean {
  return BARE_CITATION.test(unit.trim());
}

/**
 * Splits `text` with `strategy`, drops captions and bare reference lines, and numbers
 * what remains from `firstPosition`. Dropped units do not consume a position.
 */
export function segmentText(
  text: string,
  strategy: SplitStrategy,
  firstPosition = 1,
): TextUnit[] {
  const units: TextUnit[] = [];
  let position = firstPosition;

  for (const raw of strategy.split(text)) {
    const unit = raw.trim();
    if (!unit) continue;
    if (isCaption(unit)) continue;
    if (isBareCitation(unit)) continue;
    units.push({ text: unit, position });
    position++;
  }

  return units;
}
