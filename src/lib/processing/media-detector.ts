/**
 * Media type detection result
 */
export interface MediaInfo {
  /** Whether the magic bytes matched a known image format */
  recognized: boolean;
  /** MIME type */
  mimeType: string;
  /** File extension */
  extension: string;
}

const UNKNOWN: MediaInfo = {
  recognized: false,
  mimeType: "application/octet-stream",
  extension: "bin",
};

/**
 * Detect image type from a buffer's magic bytes
 */
export class MediaDetector {
  /**
   * Detect image type from buffer
   * @param buffer File data buffer
   * @returns Media info, `recognized: false` for anything else
   */
  static detectFromBuffer(buffer: Buffer): MediaInfo {
    const magic = buffer.subarray(0, 12);

    // JPEG: FF D8 FF
    if (magic[0] === 0xff && magic[1] === 0xd8 && magic[2] === 0xff) {
      return { recognized: true, mimeType: "image/jpeg", extension: "jpg" };
    }

    // PNG: 89 50 4E 47 0D 0A 1A 0A
    if (
      magic[0] === 0x89 &&
      magic[1] === 0x50 &&
      magic[2] === 0x4e &&
      magic[3] === 0x47
    ) {
      return { recognized: true, mimeType: "image/png", extension: "png" };
    }

    // GIF: 47 49 46 38 (GIF8)
    if (
      magic[0] === 0x47 &&
      magic[1] === 0x49 &&
      magic[2] === 0x46 &&
      magic[3] === 0x38
    ) {
      return { recognized: true, mimeType: "image/gif", extension: "gif" };
    }

    // WebP: 52 49 46 46 ... 57 45 42 50 (RIFF...WEBP)
    if (
      magic[0] === 0x52 &&
      magic[1] === 0x49 &&
      magic[2] === 0x46 &&
      magic[3] === 0x46 &&
      magic[8] === 0x57 &&
      magic[9] === 0x45 &&
      magic[10] === 0x42 &&
      magic[11] === 0x50
    ) {
      return { recognized: true, mimeType: "image/webp", extension: "webp" };
    }

    // BMP: 42 4D
    if (magic[0] === 0x42 && magic[1] === 0x4d) {
      return { recognized: true, mimeType: "image/bmp", extension: "bmp" };
    }

    return UNKNOWN;
  }

  /**
   * Check whether the device can draw the buffer without conversion
   *
   * The firmware decodes JPEG and falls back to PNG; only JPEG is scaled
   * to the screen.
   */
  static isDeviceNative(buffer: Buffer): boolean {
    const { mimeType } = this.detectFromBuffer(buffer);
    return mimeType === "image/jpeg" || mimeType === "image/png";
  }
}
