/**
 * TCP port of the device's plain-text line stream
 *
 * No handshake and no framing beyond newlines.
 */
export const STREAM_PORT = 2323;

/**
 * Device HTTP API routes, relative to `http://<host>/api`
 */
export const ApiRoute = {
  STATUS: "/status",
  TEXT: "/text",
  IMAGE: "/image",
  MQTT: "/mqtt",
  RETAIN: "/retain",
  SCREENSHOT: "/screenshot",
} as const;

export type ApiRoute = (typeof ApiRoute)[keyof typeof ApiRoute];

/**
 * Multipart field name the device reads uploaded images from
 */
export const UPLOAD_FIELD = "file";

/**
 * Default MQTT broker port
 */
export const DEFAULT_MQTT_PORT = 1883;

/**
 * Default text size for the text command (firmware scale 1-N)
 */
export const DEFAULT_TEXT_SIZE = 3;

/**
 * Screen geometry [width, height] of the PaperS3 panel in its default
 * landscape rotation
 */
export const DEFAULT_SCREEN: [number, number] = [960, 540];
