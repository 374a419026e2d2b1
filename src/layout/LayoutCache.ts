import type { Viewport } from '../types/geometry.js';
import type { Slide } from '../types/nodes.js';
import type { SlideLayout } from '../types/layout.js';

/**
 * Box trees keyed by slide identity and viewport.
 * Entries go away with their slide; nothing is ever patched in place.
 */
export class LayoutCache {
  private readonly entries = new WeakMap<Slide, Map<string, SlideLayout>>();
  private hitCount = 0;
  private missCount = 0;

  get(slide: Slide, viewport: Viewport): SlideLayout | undefined {
    const layout = this.entries.get(slide)?.get(viewportKey(viewport));
    if (layout) {
      this.hitCount++;
    } else {
      this.missCount++;
    }
    return layout;
  }

  set(slide: Slide, viewport: Viewport, layout: SlideLayout): void {
    let byViewport = this.entries.get(slide);
    if (!byViewport) {
      byViewport = new Map();
      this.entries.set(slide, byViewport);
    }
    byViewport.set(viewportKey(viewport), layout);
  }

  /**
   * Drops every cached layout of a slide.
   */
  invalidate(slide: Slide): void {
    this.entries.delete(slide);
  }

  get stats(): { hits: number; misses: number } {
    return { hits: this.hitCount, misses: this.missCount };
  }
}

function viewportKey(viewport: Viewport): string {
  return `${viewport.width}x${viewport.height}`;
}
