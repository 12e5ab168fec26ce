import { z } from "zod";
import type { MapConfig } from "../protocol/index.ts";
import { DEFAULT_MAP_CONFIG } from "../protocol/index.ts";
import { NotFoundError, UpstreamError, describeError } from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";
import type { FetchFn } from "../core/http.ts";
import type { BoundingBox } from "./zoom.ts";
import { boxCenter } from "./zoom.ts";

/**
 * Nominatim returns coordinates as strings; boundingbox is
 * [south, north, west, east].
 */
const searchResultSchema = z.object({
  display_name: z.string().optional(),
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  boundingbox: z.tuple([
    z.coerce.number(),
    z.coerce.number(),
    z.coerce.number(),
    z.coerce.number(),
  ]).optional(),
});

const searchResponseSchema = z.array(searchResultSchema);

export interface GeocodeResult {
  displayLabel: string;
  lat: number;
  lon: number;
  boundingBox?: BoundingBox;
}

/**
 * Resolves free-text place names through a Nominatim search endpoint
 */
export class Geocoder {
  constructor(
    private fetchFn: FetchFn = fetch,
    private config: MapConfig = DEFAULT_MAP_CONFIG,
  ) {}

  /**
   * Look up a place and return its display label and center
   *
   * The center is the bounding-box midpoint when a box is present, which
   * centers areas better than the representative point.
   *
   * @throws NotFoundError when the search has no result
   * @throws UpstreamError when the service fails or answers garbage
   */
  public async resolve(query: string): Promise<GeocodeResult> {
    const url = new URL(this.config.geocodeUrl);
    url.searchParams.set("q", query);
    url.searchParams.set("format", "json");
    url.searchParams.set("limit", "1");

    logger.info(`Geocoding "${query}"`, LogEventType.GEOCODE_START, {
      query,
    });

    let body: unknown;
    try {
      const response = await this.fetchFn(url, {
        headers: { "User-Agent": this.config.userAgent },
        signal: AbortSignal.timeout(this.config.geocodeTimeoutMs),
      });
      if (!response.ok) {
        throw new UpstreamError(
          `HTTP ${response.status} ${response.statusText}`.trim(),
          response.status,
        );
      }
      body = await response.json();
    } catch (error) {
      throw new UpstreamError(
        `Geocoding failed: ${describeError(error)}`,
        error instanceof UpstreamError ? error.status : undefined,
      );
    }

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError("Geocoding failed: unexpected response format");
    }

    const [match] = parsed.data;
    if (!match) {
      throw new NotFoundError(`Location '${query}' not found.`);
    }

    const boundingBox = match.boundingbox
      ? {
          south: match.boundingbox[0],
          north: match.boundingbox[1],
          west: match.boundingbox[2],
          east: match.boundingbox[3],
        }
      : undefined;

    const center = boundingBox
      ? boxCenter(boundingBox)
      : { lat: match.lat, lon: match.lon };

    const result: GeocodeResult = {
      displayLabel: match.display_name ?? query,
      lat: center.lat,
      lon: center.lon,
      boundingBox,
    };

    logger.info(
      `Resolved "${query}" to ${result.lat}, ${result.lon}`,
      LogEventType.GEOCODE_RESOLVED,
      result,
    );

    return result;
  }
}
