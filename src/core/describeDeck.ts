import type { ContentNode, Slide } from '../types/nodes.js';
import { walkContent } from '../types/nodes.js';

/**
 * Counts the content nodes of a slide.
 */
export function countNodes(root: ContentNode): number {
  let count = 0;
  walkContent(root, () => {
    count++;
  });
  return count;
}

/**
 * Summarizes parsed slides for inspection, one line per slide:
 *
 * ```
 * Deck: 2 slides, 5 elements
 *   [1] centre, 3 elements, styles: slide, title
 *   [2] text, 1 element, styles: none
 * ```
 */
export function describeDeck(slides: readonly Slide[]): string {
  const counts = slides.map((slide) => countNodes(slide.root));
  const total = counts.reduce((sum, n) => sum + n, 0);
  const lines = [`Deck: ${plural(slides.length, 'slide')}, ${plural(total, 'element')}`];

  slides.forEach((slide, i) => {
    const targets = slide.styleBlocks.map((block) => block.target);
    const styles = targets.length > 0 ? targets.join(', ') : 'none';
    lines.push(`  [${slide.index + 1}] ${slide.root.kind}, ${plural(counts[i] ?? 0, 'element')}, styles: ${styles}`);
  });

  return lines.join('\n');
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
