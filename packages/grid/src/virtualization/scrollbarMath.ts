export interface ScrollbarThumb {
  size: number;
  offset: number;
}

/**
 * Thumb geometry for a custom vertical scrollbar drawn over the (possibly compressed) spacer.
 *
 * Works entirely in physical pixels, so the thumb tracks the host scroll position rather than the
 * logical row index.
 */
export function computeScrollbarThumb(options: {
  scrollOffset: number;
  viewportHeight: number;
  spacerExtent: number;
  trackSize: number;
  minThumbSize?: number;
}): ScrollbarThumb {
  const minThumbSize = options.minThumbSize ?? 24;
  const trackSize = Math.max(0, options.trackSize);
  const viewportHeight = Math.max(0, options.viewportHeight);
  const contentSize = Math.max(0, options.spacerExtent);
  const maxScroll = Math.max(0, contentSize - viewportHeight);

  if (trackSize === 0) return { size: 0, offset: 0 };
  if (contentSize === 0 || maxScroll === 0) return { size: trackSize, offset: 0 };

  const scrollOffset = Math.min(Math.max(0, options.scrollOffset), maxScroll);
  const size = Math.min(trackSize, Math.max(minThumbSize, (viewportHeight / contentSize) * trackSize));
  const travel = Math.max(0, trackSize - size);
  return { size, offset: travel === 0 ? 0 : (scrollOffset / maxScroll) * travel };
}
