import type { MapConfig, ScreenGeometry } from "../protocol/index.ts";
import { DEFAULT_MAP_CONFIG } from "../protocol/index.ts";
import type { DeviceClient } from "../core/device-client.ts";
import type { FetchFn } from "../core/http.ts";
import type {
  DeviceImage,
  ImageNormalizer,
  NormalizeOptions,
  StageResult,
} from "../processing/index.ts";
import {
  AuthenticationError,
  UpstreamError,
  describeError,
} from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";

export interface MapView {
  lat: number;
  lon: number;
  zoom: number;
  apiKey: string;
}

export interface MapRenderOptions extends NormalizeOptions {
  /** Receives non-fatal problems, such as an unreachable status endpoint */
  onWarning?: (message: string) => void;
}

/**
 * Fetches a static map sized to the device screen and prepares it for e-ink
 */
export class MapRenderer {
  constructor(
    private client: DeviceClient,
    private normalizer: ImageNormalizer,
    private fetchFn: FetchFn = fetch,
    private config: MapConfig = DEFAULT_MAP_CONFIG,
  ) {}

  /**
   * Render a map for the current screen geometry
   *
   * @throws AuthenticationError when the tile service rejects the key
   * @throws UpstreamError when the tile cannot be fetched
   */
  public async render(
    view: MapView,
    options: MapRenderOptions = {},
  ): Promise<StageResult<DeviceImage>> {
    const screen = await this.screenGeometry(options.onWarning);
    const tile = await this.fetchTile(this.tileUrl(view, screen));

    return this.normalizer.normalize(
      tile,
      { kind: "map", screen },
      { forceRaw: options.forceRaw, onProgress: options.onProgress },
    );
  }

  /**
   * Ask the device for its geometry; falls back to the configured screen
   */
  public async screenGeometry(
    onWarning?: (message: string) => void,
  ): Promise<ScreenGeometry> {
    const [width, height] = this.config.fallbackScreen;
    const fallback = { width, height };

    try {
      const status = await this.client.getStatus(fallback);
      return { width: status.screenWidth, height: status.screenHeight };
    } catch (error) {
      onWarning?.(
        `Could not get device screen dimensions (${describeError(error)}), using ${width}x${height}`,
      );
      return fallback;
    }
  }

  /**
   * Static map URL at double pixel density for the given logical size
   */
  public tileUrl(view: MapView, screen: ScreenGeometry): URL {
    const url = new URL(this.config.tileUrl.replace("{style}", this.config.style));
    const point = `${view.lat},${view.lon}`;

    url.searchParams.set("center", point);
    url.searchParams.set("zoom", String(view.zoom));
    url.searchParams.set("size", `${screen.width}x${screen.height}@2x`);
    url.searchParams.set("markers", point);
    url.searchParams.set("api_key", view.apiKey);
    return url;
  }

  private async fetchTile(url: URL): Promise<Buffer> {
    logger.info(
      `Fetching map tile ${url.searchParams.get("size")} at zoom ${url.searchParams.get("zoom")}`,
      LogEventType.MAP_FETCH,
      { center: url.searchParams.get("center") },
    );

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        signal: AbortSignal.timeout(this.config.tileTimeoutMs),
      });
    } catch (error) {
      throw new UpstreamError(`Map request failed: ${describeError(error)}`);
    }

    if (response.status === 401) {
      throw new AuthenticationError();
    }
    if (!response.ok) {
      throw new UpstreamError(
        `Map request failed: HTTP ${response.status}`,
        response.status,
      );
    }

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new UpstreamError(`Map download failed: ${describeError(error)}`);
    }
  }
}
