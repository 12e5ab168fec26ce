import { z } from "zod";
import type { DeviceStatus, ScreenGeometry } from "../interfaces/index.ts";
import type { MqttResponse, RetainResponse } from "../response-types.ts";
import { DeliveryError } from "../../utils/errors.ts";

const statusSchema = z.object({
  mode: z.string().default("UNKNOWN"),
  heap_free: z.number().default(0),
  heap_min: z.number().optional(),
  spiram_free: z.number().optional(),
  wifi_rssi: z.number().optional(),
  screen_width: z.number().int().positive().optional(),
  screen_height: z.number().int().positive().optional(),
  rotation: z.number().optional(),
  retain: z.boolean().optional(),
  mqtt_connected: z.boolean().optional(),
  mqtt_topic: z.string().optional(),
  mqtt_broker: z.string().optional(),
});

const mqttSchema = z.object({
  status: z.string().optional(),
  connected: z.boolean().default(false),
  broker: z.string().optional(),
  topic: z.string().optional(),
});

const retainSchema = z.object({
  retain: z.boolean(),
});

const errorSchema = z.object({
  error: z.string(),
});

/**
 * Parser for JSON responses received from the device HTTP API
 *
 * Validates bodies with zod and maps the firmware's snake_case fields
 * onto typed objects.
 */
export class ResponseParser {
  /**
   * Parses a `GET /api/status` body
   *
   * Missing screen fields take the fallback geometry, as older firmware
   * builds do not report them.
   *
   * @throws DeliveryError when the body is not a status object
   */
  public static parseStatus(
    body: unknown,
    fallbackScreen: ScreenGeometry,
  ): DeviceStatus {
    const result = statusSchema.safeParse(body);
    if (!result.success) {
      throw new DeliveryError(
        `Unexpected status response: ${result.error.issues[0]?.message ?? "invalid body"}`,
      );
    }

    const data = result.data;
    const status: DeviceStatus = {
      mode: data.mode,
      heapFree: data.heap_free,
      heapMin: data.heap_min,
      spiramFree: data.spiram_free,
      wifiRssi: data.wifi_rssi,
      screenWidth: data.screen_width ?? fallbackScreen.width,
      screenHeight: data.screen_height ?? fallbackScreen.height,
      rotation: data.rotation,
      retain: data.retain,
    };

    if (data.mqtt_connected !== undefined) {
      status.mqtt = {
        connected: data.mqtt_connected,
        topic: data.mqtt_topic,
        broker: data.mqtt_broker,
      };
    }

    return status;
  }

  /**
   * Parses a `POST /api/mqtt` body
   *
   * A body without `connected` is treated as not connected.
   */
  public static parseMqtt(body: unknown): MqttResponse {
    const result = mqttSchema.safeParse(body);
    if (!result.success) {
      return { connected: false };
    }
    return result.data;
  }

  /**
   * Parses a `POST /api/retain` body
   *
   * @throws DeliveryError when `retain` is missing
   */
  public static parseRetain(body: unknown): RetainResponse {
    const result = retainSchema.safeParse(body);
    if (!result.success) {
      throw new DeliveryError("Unexpected retain response");
    }
    return result.data;
  }

  /**
   * Extracts the `error` field the firmware puts in rejection bodies
   *
   * @param text - Raw response body
   * @returns The error detail, or undefined when the body carries none
   */
  public static errorDetail(text: string): string | undefined {
    const result = errorSchema.safeParse(ResponseParser.extractJson(text));
    return result.success ? result.data.error : undefined;
  }

  /**
   * Extracts JSON data from response text
   *
   * Attempts to parse the entire text as JSON. If that fails,
   * attempts to extract JSON from within the text by finding
   * the first '{' and last '}' characters.
   *
   * @param text - Response text to parse
   * @returns Parsed JSON value or null if no valid JSON found
   */
  public static extractJson(text: string): unknown {
    const trimmed = text.replace(/\x00/g, "").trim();
    if (trimmed.length === 0) return null;

    try {
      return JSON.parse(trimmed);
    } catch {
      // Firmware may append a newline or log noise around the JSON
      const start = trimmed.indexOf("{");
      const end = trimmed.lastIndexOf("}");

      if (start !== -1 && end !== -1 && end > start) {
        try {
          return JSON.parse(trimmed.substring(start, end + 1));
        } catch {
          return null;
        }
      }
    }

    return null;
  }
}
