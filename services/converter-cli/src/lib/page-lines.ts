/**
 * Page Line Assembly
 *
 * Rebuilds reading-order lines from positioned PDF text items.
 */

/** A positioned text run as reported by pdf.js `getTextContent` */
export interface PositionedText {
  str: string;
  /** Text matrix; [4] is X and [5] is Y, with Y growing upward */
  transform: number[];
}

/**
 * Group items by rounded Y position (top to bottom), then join the items of
 * each row left to right with single spaces. Blank rows are dropped.
 */
export function assembleLines(items: readonly PositionedText[]): string[] {
  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of items) {
    if (item.str.trim() === '') continue;

    // Text on the same visual line may have slight Y variations
    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);

    const row = itemsByY.get(y) ?? [];
    row.push({ x, str: item.str });
    itemsByY.set(y, row);
  }

  const lines: string[] = [];
  for (const y of [...itemsByY.keys()].sort((a, b) => b - a)) {
    const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
    const lineText = lineItems.map((item) => item.str.trim()).join(' ').trim();
    if (lineText) {
      lines.push(lineText);
    }
  }

  return lines;
}
