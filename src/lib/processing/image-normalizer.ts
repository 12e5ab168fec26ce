import type sharp from "sharp";
import type { ImageConfig, ScreenGeometry } from "../protocol/index.ts";
import { DEFAULT_IMAGE_CONFIG } from "../protocol/index.ts";
import { MissingCapabilityError, describeError } from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";
import { MediaDetector } from "./media-detector.ts";
import { andThen, degraded, failed, ok } from "./pipeline.ts";
import type { StageResult } from "./pipeline.ts";

export type ImageEngine = typeof sharp;

/**
 * Resolves the image engine, or null when it cannot be loaded on this host
 */
export type EngineLoader = () => Promise<ImageEngine | null>;

/**
 * JPEG produced by the normalizer, sized for the device
 */
export interface NormalizedImage {
  normalized: true;
  encodedBytes: Buffer;
  mimeType: "image/jpeg";
  width: number;
  height: number;
}

/**
 * Input passed through unchanged
 */
export interface RawImage {
  normalized: false;
  encodedBytes: Buffer;
  mimeType: string;
}

export type DeviceImage = NormalizedImage | RawImage;

/**
 * Which processing path to take
 *
 * - generic: contain-fit into the configured bounding box
 * - map: exact-fit to the screen, grayscale and contrast boost
 */
export type NormalizeTarget =
  | { kind: "generic" }
  | { kind: "map"; screen: ScreenGeometry };

export interface NormalizeOptions {
  /** Send the input unchanged when no image engine is available */
  forceRaw?: boolean;
  /** Receives human-readable progress lines */
  onProgress?: (message: string) => void;
}

interface DecodedSource {
  engine: ImageEngine;
  width: number;
  height: number;
}

/**
 * Loads sharp lazily so that a missing native binary degrades instead of
 * crashing at startup.
 */
export const loadSharp: EngineLoader = async () => {
  try {
    const mod = await import("sharp");
    return mod.default;
  } catch (error) {
    logger.debug(`sharp could not be loaded: ${describeError(error)}`);
    return null;
  }
};

/**
 * Compute contain-fit dimensions: scale to fit inside `bounds` keeping the
 * aspect ratio, never upscaling.
 */
export function containFit(
  source: ScreenGeometry,
  bounds: ScreenGeometry,
): ScreenGeometry {
  if (source.width <= bounds.width && source.height <= bounds.height) {
    return { width: source.width, height: source.height };
  }

  const scale = Math.min(
    bounds.width / source.width,
    bounds.height / source.height,
  );

  return {
    width: Math.max(1, Math.round(source.width * scale)),
    height: Math.max(1, Math.round(source.height * scale)),
  };
}

/**
 * Image normalizer turning arbitrary input into a device-safe JPEG.
 * Each step is a stage returning ok, degraded (send the input raw) or
 * failed; processing errors never abort the command.
 */
export class ImageNormalizer {
  private engine: Promise<ImageEngine | null> | null = null;

  /**
   * @param config Image configuration (bounds, JPEG qualities, contrast)
   * @param loadEngine Engine loader, replaceable in tests
   */
  constructor(
    private config: ImageConfig = DEFAULT_IMAGE_CONFIG,
    private loadEngine: EngineLoader = loadSharp,
  ) {}

  /**
   * Normalize image bytes for the device
   * @param input Bytes claimed to be an image
   * @param target Generic contain-fit, or exact-fit map rendering
   * @returns Stage result holding the image to upload
   */
  public async normalize(
    input: Buffer,
    target: NormalizeTarget,
    options: NormalizeOptions = {},
  ): Promise<StageResult<DeviceImage>> {
    const raw = ImageNormalizer.passthrough(input);

    const capability = await this.requireEngine(raw, options.forceRaw ?? false);
    const decoded = await andThen(capability, (engine) =>
      this.decode(engine, input, raw),
    );

    return andThen(decoded, (source) =>
      target.kind === "map"
        ? this.renderMap(source, input, target.screen, raw, options)
        : this.renderGeneric(source, input, raw, options),
    );
  }

  /**
   * Wrap bytes as an unprocessed upload
   */
  public static passthrough(input: Buffer): RawImage {
    return {
      normalized: false,
      encodedBytes: input,
      mimeType: MediaDetector.detectFromBuffer(input).mimeType,
    };
  }

  private async requireEngine(
    raw: RawImage,
    forceRaw: boolean,
  ): Promise<StageResult<ImageEngine, DeviceImage>> {
    this.engine ??= this.loadEngine();
    const engine = await this.engine;
    if (engine) {
      return ok<ImageEngine, DeviceImage>(engine);
    }

    const [width, height] = this.config.maxSize;
    const warning = `Image processing is unavailable; the device requires images within ${width}x${height}.`;

    if (forceRaw) {
      return degraded<ImageEngine, DeviceImage>(
        raw,
        `${warning} Proceeding with raw upload (--force-raw).`,
      );
    }

    return failed<ImageEngine, DeviceImage>(
      new MissingCapabilityError(
        `${warning} Install sharp to resize images automatically, or pass --force-raw to send the image unchanged.`,
      ),
    );
  }

  private async decode(
    engine: ImageEngine,
    input: Buffer,
    raw: RawImage,
  ): Promise<StageResult<DecodedSource, DeviceImage>> {
    try {
      const metadata = await engine(input).metadata();
      if (!metadata.width || !metadata.height) {
        return degraded<DecodedSource, DeviceImage>(
          raw,
          "Image processing failed (unknown dimensions). Sending raw data.",
        );
      }
      return ok<DecodedSource, DeviceImage>({
        engine,
        width: metadata.width,
        height: metadata.height,
      });
    } catch (error) {
      return degraded<DecodedSource, DeviceImage>(
        raw,
        `Image processing failed (${describeError(error)}). Sending raw data.`,
      );
    }
  }

  private async renderGeneric(
    source: DecodedSource,
    input: Buffer,
    raw: RawImage,
    options: NormalizeOptions,
  ): Promise<StageResult<DeviceImage>> {
    const [maxWidth, maxHeight] = this.config.maxSize;
    const size = containFit(source, { width: maxWidth, height: maxHeight });

    options.onProgress?.(
      `Processing: Original ${source.width}x${source.height} -> Max ${maxWidth}x${maxHeight}`,
    );

    try {
      let pipeline = source
        .engine(input)
        .flatten({ background: this.config.background });

      if (size.width !== source.width || size.height !== source.height) {
        pipeline = pipeline.resize(size.width, size.height, {
          fit: "fill",
          kernel: "lanczos3",
        });
      }

      const encodedBytes = await pipeline
        .toColorspace("srgb")
        .jpeg({ quality: this.config.jpegQuality })
        .toBuffer();

      logger.info(
        `Normalized ${source.width}x${source.height} -> ${size.width}x${size.height} (${encodedBytes.length} bytes)`,
        LogEventType.IMAGE_PROCESSED,
        size,
      );

      return ok<DeviceImage>({
        normalized: true,
        encodedBytes,
        mimeType: "image/jpeg",
        width: size.width,
        height: size.height,
      });
    } catch (error) {
      return degraded<DeviceImage, DeviceImage>(
        raw,
        `Image processing failed (${describeError(error)}). Sending raw data.`,
      );
    }
  }

  private async renderMap(
    source: DecodedSource,
    input: Buffer,
    screen: ScreenGeometry,
    raw: RawImage,
    options: NormalizeOptions,
  ): Promise<StageResult<DeviceImage>> {
    if (source.width !== screen.width || source.height !== screen.height) {
      options.onProgress?.(
        `Resizing map from ${source.width}x${source.height} to ${screen.width}x${screen.height}...`,
      );
    }

    try {
      const gray = await source
        .engine(input)
        .flatten({ background: this.config.background })
        .resize(screen.width, screen.height, { fit: "fill", kernel: "lanczos3" })
        .grayscale()
        .png()
        .toBuffer();

      // Contrast is stretched around the mean gray level
      const { channels } = await source.engine(gray).stats();
      const mean = Math.round(channels[0]?.mean ?? 128);
      const factor = this.config.mapContrast;

      const encodedBytes = await source
        .engine(gray)
        .linear(factor, mean * (1 - factor))
        .toColorspace("srgb")
        .jpeg({ quality: this.config.mapJpegQuality })
        .toBuffer();

      logger.info(
        `Rendered map ${screen.width}x${screen.height}, mean gray ${mean} (${encodedBytes.length} bytes)`,
        LogEventType.IMAGE_PROCESSED,
        screen,
      );

      return ok<DeviceImage>({
        normalized: true,
        encodedBytes,
        mimeType: "image/jpeg",
        width: screen.width,
        height: screen.height,
      });
    } catch (error) {
      return degraded<DeviceImage, DeviceImage>(
        raw,
        `Map processing failed (${describeError(error)}). Sending map without enhancement.`,
      );
    }
  }
}
