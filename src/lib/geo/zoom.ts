/**
 * Place extent as south/north/west/east limits in degrees
 */
export interface BoundingBox {
  south: number;
  north: number;
  west: number;
  east: number;
}

/**
 * Zoom used for a geocoded place that has no bounding box
 */
export const DEFAULT_LOCATION_ZOOM = 14;

/**
 * Zoom used for explicit --lat/--lon without --zoom
 *
 * Independent of DEFAULT_LOCATION_ZOOM; the two are not meant to agree.
 */
export const DEFAULT_COORDINATE_ZOOM = 15;

/**
 * Span thresholds (degrees, exclusive) and the zoom chosen above each,
 * largest first. Spans at or below the last threshold get FINEST_ZOOM.
 */
const SPAN_ZOOM_STEPS: ReadonlyArray<readonly [number, number]> = [
  [10, 5],
  [5, 7],
  [1, 10],
  [0.1, 13],
  [0.01, 15],
];

const FINEST_ZOOM = 16;

/**
 * Largest side of a bounding box in degrees
 */
export function maxSpan(box: BoundingBox): number {
  return Math.max(box.north - box.south, box.east - box.west);
}

/**
 * Map a span in degrees to a zoom level: countries zoom out, buildings zoom in.
 */
export function zoomForSpan(span: number): number {
  for (const [threshold, zoom] of SPAN_ZOOM_STEPS) {
    if (span > threshold) return zoom;
  }
  return FINEST_ZOOM;
}

/**
 * Zoom for a geocoded place: from its bounding box, or the location default.
 */
export function zoomForPlace(box?: BoundingBox): number {
  return box ? zoomForSpan(maxSpan(box)) : DEFAULT_LOCATION_ZOOM;
}

/**
 * Center of a bounding box
 */
export function boxCenter(box: BoundingBox): { lat: number; lon: number } {
  return {
    lat: (box.south + box.north) / 2,
    lon: (box.west + box.east) / 2,
  };
}
