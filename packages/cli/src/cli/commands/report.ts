/**
 * Output helpers for per-wallet commands
 */

/**
 * One output line tagged with the wallet (or transfer) index it belongs to
 */
export interface IndexedLine {
  index: number;
  text: string;
  /** Print to stderr instead of stdout */
  error?: boolean;
}

/**
 * Collecting Worker strategies return results lane-major; print them back
 * in index order.
 */
export function printInOrder(lines: IndexedLine[]): void {
  const sorted = [...lines].sort((a, b) => a.index - b.index);
  for (const line of sorted) {
    if (line.error) {
      console.error(line.text);
    } else {
      console.log(line.text);
    }
  }
}
