/**
 * Device transport configuration
 *
 * Every device call is a single attempt bounded by one of these timeouts.
 */
export interface DeviceConfig {
  /**
   * TCP port used by the stream command
   */
  streamPort: number;

  /**
   * Timeout (ms) for small JSON calls: status, text, retain
   */
  jsonTimeoutMs: number;

  /**
   * Timeout (ms) for the MQTT configuration call
   *
   * The device connects to the broker before it answers.
   */
  mqttTimeoutMs: number;

  /**
   * Timeout (ms) for image uploads and screenshot downloads
   */
  uploadTimeoutMs: number;
}

/**
 * Image processing settings
 *
 * Generic images are contain-fit into `maxSize`; map images are resized to
 * the device geometry exactly and contrast-boosted for e-ink.
 */
export interface ImageConfig {
  /**
   * Bounding box [width, height] for generic images
   *
   * Square so that portrait and landscape captures both keep their full
   * resolution on the rotating display.
   */
  maxSize: [number, number];

  /**
   * JPEG quality (0-100) for generic images
   */
  jpegQuality: number;

  /**
   * JPEG quality (0-100) for map images
   */
  mapJpegQuality: number;

  /**
   * Contrast factor applied to map images (1.0 = unchanged)
   */
  mapContrast: number;

  /**
   * Colour transparent or indexed input is flattened onto
   */
  background: string;
}

/**
 * Geocoding and static-map service settings
 */
export interface MapConfig {
  /**
   * Nominatim search endpoint
   */
  geocodeUrl: string;

  /**
   * Client identifier sent as User-Agent (required by the geocoder's usage policy)
   */
  userAgent: string;

  /**
   * Timeout (ms) for the geocoding lookup
   */
  geocodeTimeoutMs: number;

  /**
   * Static map endpoint, `{style}` is replaced by `style`
   */
  tileUrl: string;

  /**
   * Map style name
   */
  style: string;

  /**
   * Timeout (ms) for the tile fetch
   */
  tileTimeoutMs: number;

  /**
   * Screen geometry [width, height] assumed when the device status is unavailable
   */
  fallbackScreen: [number, number];
}
