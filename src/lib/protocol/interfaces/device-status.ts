/**
 * Device status as reported by `GET /api/status`
 */
export interface DeviceStatus {
  /**
   * Current display mode
   *
   * One of NONE, TEXT, IMAGE, STREAM, MQTT as observed
   */
  mode: string;

  /**
   * Free heap in bytes
   */
  heapFree: number;

  /**
   * Lowest free heap since boot, in bytes
   */
  heapMin?: number;

  /**
   * Free PSRAM in bytes
   */
  spiramFree?: number;

  /**
   * Wi-Fi signal strength in dBm
   */
  wifiRssi?: number;

  /**
   * Current screen width in pixels (changes with rotation)
   */
  screenWidth: number;

  /**
   * Current screen height in pixels (changes with rotation)
   */
  screenHeight: number;

  rotation?: number;

  /**
   * Whether content is kept on screen across sleep
   */
  retain?: boolean;

  /**
   * MQTT fields, only present while the device is in MQTT mode
   */
  mqtt?: {
    connected: boolean;
    topic?: string;
    broker?: string;
  };
}

/**
 * Screen geometry used to size map images
 */
export interface ScreenGeometry {
  width: number;
  height: number;
}
