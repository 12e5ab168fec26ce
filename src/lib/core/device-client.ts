import type {
  DeviceConfig,
  DeviceStatus,
  MqttPayload,
  MqttResponse,
  RetainResponse,
  ScreenGeometry,
  TextPayload,
} from "../protocol/index.ts";
import {
  ApiRoute,
  DEFAULT_DEVICE_CONFIG,
  DEFAULT_SCREEN,
  ResponseParser,
  UPLOAD_FIELD,
} from "../protocol/index.ts";
import { DeliveryError, describeError } from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";
import type { FetchFn } from "./http.ts";
import { safeText } from "./http.ts";
import type { Endpoint } from "./target-resolver.ts";
import { apiBaseUrl } from "./target-resolver.ts";

/**
 * HTTP client for the PaperS3 display API.
 * Every call is a single attempt with a fixed timeout; rejections and
 * transport failures surface as DeliveryError.
 */
export class DeviceClient {
  public readonly baseUrl: string;

  constructor(
    endpoint: Endpoint,
    private fetchFn: FetchFn = fetch,
    private config: DeviceConfig = DEFAULT_DEVICE_CONFIG,
  ) {
    this.baseUrl = apiBaseUrl(endpoint);
  }

  /**
   * Absolute URL of an API route
   */
  public url(route: ApiRoute): string {
    return `${this.baseUrl}${route}`;
  }

  /**
   * Query the device status
   * @param fallbackScreen Geometry to assume when the firmware omits it
   */
  public async getStatus(
    fallbackScreen: ScreenGeometry = {
      width: DEFAULT_SCREEN[0],
      height: DEFAULT_SCREEN[1],
    },
  ): Promise<DeviceStatus> {
    logger.info("Querying device status", LogEventType.STATUS_QUERY);
    const response = await this.request(
      ApiRoute.STATUS,
      { method: "GET" },
      this.config.jsonTimeoutMs,
    );
    const status = ResponseParser.parseStatus(
      await this.readJson(response),
      fallbackScreen,
    );
    logger.info(
      `Device status: ${status.mode}, ${status.screenWidth}x${status.screenHeight}`,
      LogEventType.STATUS_RECEIVED,
      status,
    );
    return status;
  }

  /**
   * Show text on the display
   */
  public async sendText(payload: TextPayload): Promise<void> {
    await this.postJson(ApiRoute.TEXT, payload, this.config.jsonTimeoutMs);
  }

  /**
   * Upload image bytes as multipart field `file`
   * @param bytes Encoded image (JPEG unless sent raw)
   * @param filename Filename reported in the multipart part
   */
  public async uploadImage(bytes: Buffer, filename: string): Promise<void> {
    const form = new FormData();
    form.append(
      UPLOAD_FIELD,
      new Blob([new Uint8Array(bytes)], { type: "application/octet-stream" }),
      filename,
    );

    await this.request(
      ApiRoute.IMAGE,
      { method: "POST", body: form },
      this.config.uploadTimeoutMs,
    );
  }

  /**
   * Point the device at an MQTT broker and topic
   */
  public async configureMqtt(payload: MqttPayload): Promise<MqttResponse> {
    const response = await this.postJson(
      ApiRoute.MQTT,
      payload,
      this.config.mqttTimeoutMs,
    );
    return ResponseParser.parseMqtt(await this.readJson(response));
  }

  /**
   * Set whether content stays on screen across sleep
   * @param retain New value; toggles when omitted
   */
  public async setRetain(retain?: boolean): Promise<RetainResponse> {
    const response =
      retain === undefined
        ? await this.request(
            ApiRoute.RETAIN,
            { method: "POST" },
            this.config.jsonTimeoutMs,
          )
        : await this.postJson(
            ApiRoute.RETAIN,
            { retain },
            this.config.jsonTimeoutMs,
          );
    return ResponseParser.parseRetain(await this.readJson(response));
  }

  /**
   * Download the current frame buffer (BMP)
   */
  public async fetchScreenshot(): Promise<Buffer> {
    const response = await this.request(
      ApiRoute.SCREENSHOT,
      { method: "GET" },
      this.config.uploadTimeoutMs,
    );
    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new DeliveryError(
        `Screenshot download failed: ${describeError(error)}`,
      );
    }
  }

  private postJson(
    route: ApiRoute,
    payload: object,
    timeoutMs: number,
  ): Promise<Response> {
    return this.request(
      route,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
      },
      timeoutMs,
    );
  }

  private async request(
    route: ApiRoute,
    init: RequestInit,
    timeoutMs: number,
  ): Promise<Response> {
    const url = this.url(route);
    const method = init.method ?? "GET";

    logger.debug(`${method} ${url}`, LogEventType.REQUEST_SEND, { route });

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        ...init,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new DeliveryError(
        `Could not reach device at ${url}: ${describeError(error)}`,
      );
    }

    if (!response.ok) {
      const detail = ResponseParser.errorDetail(await safeText(response));
      const reason = response.statusText
        ? `${response.status} ${response.statusText}`
        : `${response.status}`;
      throw new DeliveryError(
        `Device rejected ${method} ${route}: HTTP ${reason}`,
        response.status,
        detail,
      );
    }

    logger.debug(
      `${method} ${url} -> ${response.status}`,
      LogEventType.REQUEST_COMPLETE,
      { route, status: response.status },
    );
    return response;
  }

  private async readJson(response: Response): Promise<unknown> {
    return ResponseParser.extractJson(await safeText(response));
  }
}
