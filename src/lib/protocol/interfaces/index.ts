export type { DeviceConfig, ImageConfig, MapConfig } from "./config.ts";
export type { DeviceStatus, ScreenGeometry } from "./device-status.ts";
export {
  DEFAULT_DEVICE_CONFIG,
  DEFAULT_IMAGE_CONFIG,
  DEFAULT_MAP_CONFIG,
} from "./defaults.ts";
