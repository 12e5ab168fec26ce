import { InvalidArgumentError } from "commander";

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export function parseTextSize(value: string): number {
  const size = parseInteger(value);
  if (size < 1) {
    throw new InvalidArgumentError("Text size must be at least 1.");
  }
  return size;
}

export function parsePort(value: string): number {
  const port = parseInteger(value);
  if (port < 1 || port > 65535) {
    throw new InvalidArgumentError("Port must be between 1 and 65535.");
  }
  return port;
}

export function parseZoom(value: string): number {
  const zoom = parseInteger(value);
  if (zoom < 0 || zoom > 20) {
    throw new InvalidArgumentError("Zoom must be between 0 and 20.");
  }
  return zoom;
}

function parseDegrees(value: string, limit: number, label: string): number {
  const degrees = Number(value);
  if (value.trim() === "" || !Number.isFinite(degrees)) {
    throw new InvalidArgumentError(`${label} must be a number.`);
  }
  if (Math.abs(degrees) > limit) {
    throw new InvalidArgumentError(
      `${label} must be between -${limit} and ${limit}.`,
    );
  }
  return degrees;
}

export const parseLatitude = (value: string): number =>
  parseDegrees(value, 90, "Latitude");

export const parseLongitude = (value: string): number =>
  parseDegrees(value, 180, "Longitude");

/**
 * `on`/`off` to a boolean
 */
export function parseSwitch(value: string): boolean {
  switch (value.toLowerCase()) {
    case "on":
      return true;
    case "off":
      return false;
    default:
      throw new InvalidArgumentError("Expected 'on' or 'off'.");
  }
}
