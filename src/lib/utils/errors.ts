/**
 * Base error class for all paperctl errors
 */
export class PaperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PaperError";
    Object.setPrototypeOf(this, PaperError.prototype);
  }
}

/**
 * Error thrown when a required setting (device address, API key, map
 * coordinates) is missing or contradictory
 */
export class ConfigurationError extends PaperError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when no usable input (text or image bytes) is available
 */
export class InputError extends PaperError {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
    Object.setPrototypeOf(this, InputError.prototype);
  }
}

/**
 * Error thrown when image processing is unavailable and raw upload was not forced
 */
export class MissingCapabilityError extends PaperError {
  constructor(message: string = "Image processing is not available") {
    super(message);
    this.name = "MissingCapabilityError";
    Object.setPrototypeOf(this, MissingCapabilityError.prototype);
  }
}

/**
 * Error thrown when a geocoding lookup has no match
 */
export class NotFoundError extends PaperError {
  constructor(message: string = "Location not found") {
    super(message);
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Error thrown when the map service rejects the API key
 */
export class AuthenticationError extends PaperError {
  constructor(message: string = "Invalid API key.") {
    super(message);
    this.name = "AuthenticationError";
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Error thrown when a third-party service (geocoder, tile server) fails
 */
export class UpstreamError extends PaperError {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "UpstreamError";
    Object.setPrototypeOf(this, UpstreamError.prototype);
  }
}

/**
 * Error thrown when the device rejects a request or cannot be reached
 */
export class DeliveryError extends PaperError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly detail?: string,
  ) {
    super(message);
    this.name = "DeliveryError";
    Object.setPrototypeOf(this, DeliveryError.prototype);
  }
}

/**
 * Render any thrown value as a one-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Process exit status for a failure. Delivery failures are reported but
 * leave the status at 0; everything else is 1.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof DeliveryError ? 0 : 1;
}
