import type { DeviceConfig, ImageConfig, MapConfig } from "./config.ts";
import { DEFAULT_SCREEN, STREAM_PORT } from "../constants.ts";

/**
 * Default transport configuration for the PaperS3 firmware
 *
 * - jsonTimeoutMs: 5s - status/text/retain answer immediately
 * - mqttTimeoutMs: 10s - device connects to the broker before replying
 * - uploadTimeoutMs: 30s - JPEG decode and e-ink refresh happen in-request
 */
export const DEFAULT_DEVICE_CONFIG: DeviceConfig = {
  streamPort: STREAM_PORT,
  jsonTimeoutMs: 5_000,
  mqttTimeoutMs: 10_000,
  uploadTimeoutMs: 30_000,
};

/**
 * Default image processing configuration
 *
 * The panel is 960x540 and rotates, so generic images are bounded by
 * 960x960 rather than a fixed orientation.
 */
export const DEFAULT_IMAGE_CONFIG: ImageConfig = {
  maxSize: [960, 960],
  jpegQuality: 85,
  mapJpegQuality: 90,
  mapContrast: 1.2,
  background: "#ffffff",
};

export const DEFAULT_MAP_CONFIG: MapConfig = {
  geocodeUrl: "https://nominatim.openstreetmap.org/search",
  userAgent: "paperctl/1.0",
  geocodeTimeoutMs: 10_000,
  tileUrl: "https://tiles.stadiamaps.com/static/{style}.png",
  style: "stamen_toner",
  tileTimeoutMs: 30_000,
  fallbackScreen: DEFAULT_SCREEN,
};
