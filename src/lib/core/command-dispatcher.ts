import { readFile, writeFile } from "node:fs/promises";
import type {
  DeviceConfig,
  ImageConfig,
  MapConfig,
  MqttPayload,
} from "../protocol/index.ts";
import {
  DEFAULT_DEVICE_CONFIG,
  DEFAULT_IMAGE_CONFIG,
  DEFAULT_MAP_CONFIG,
} from "../protocol/index.ts";
import { Geocoder } from "../geo/geocoder.ts";
import { MapRenderer } from "../geo/map-renderer.ts";
import { DEFAULT_COORDINATE_ZOOM, zoomForPlace } from "../geo/zoom.ts";
import {
  ImageNormalizer,
  MediaDetector,
  loadSharp,
  unwrap,
} from "../processing/index.ts";
import type {
  DeviceImage,
  EngineLoader,
  StageResult,
} from "../processing/index.ts";
import {
  ConfigurationError,
  DeliveryError,
  InputError,
  describeError,
  exitCodeFor,
} from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";
import { DeviceClient } from "./device-client.ts";
import type { FetchFn } from "./http.ts";
import { isPiped, readAll } from "./input.ts";
import type { InputStream } from "./input.ts";
import { StreamSession } from "./stream-session.ts";
import type { Endpoint } from "./target-resolver.ts";
import { resolveApiKey, resolveEndpoint } from "./target-resolver.ts";

/**
 * One operator request; exactly one variant per invocation
 */
export type DisplayCommand =
  | { kind: "text"; body?: string; size: number }
  | { kind: "image"; path?: string; forceRaw: boolean }
  | { kind: "stream" }
  | {
      kind: "map";
      lat?: number;
      lon?: number;
      location?: string;
      zoom?: number;
      apiKey?: string;
      forceRaw: boolean;
    }
  | {
      kind: "mqtt";
      broker: string;
      topic: string;
      port: number;
      username?: string;
      password?: string;
    }
  | { kind: "retain"; enabled?: boolean }
  | { kind: "screenshot"; output: string };

/**
 * Operator-facing output
 */
export interface CommandIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface DispatcherDeps {
  fetchFn?: FetchFn;
  stdin?: InputStream;
  io?: CommandIO;
  env?: NodeJS.ProcessEnv;
  loadEngine?: EngineLoader;
  readFile?: (path: string) => Promise<Buffer>;
  writeFile?: (path: string, data: Buffer) => Promise<void>;
  deviceConfig?: DeviceConfig;
  imageConfig?: ImageConfig;
  mapConfig?: MapConfig;
}

export interface Invocation {
  command: DisplayCommand;
  /** Value of `--ip`, if given */
  ip?: string;
  /** Interrupts a running stream */
  signal?: AbortSignal;
}

export interface CommandOutcome {
  exitCode: number;
}

const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

/**
 * Routes a DisplayCommand to its transport.
 *
 * Failures are caught at this boundary: device delivery failures are
 * printed and exit 0, everything else exits 1.
 */
export class CommandDispatcher {
  private fetchFn: FetchFn;
  private stdin: InputStream;
  private io: CommandIO;
  private env: NodeJS.ProcessEnv;
  private normalizer: ImageNormalizer;
  private readInput: (path: string) => Promise<Buffer>;
  private writeOutput: (path: string, data: Buffer) => Promise<void>;
  private deviceConfig: DeviceConfig;
  private mapConfig: MapConfig;

  constructor(deps: DispatcherDeps = {}) {
    this.fetchFn = deps.fetchFn ?? fetch;
    this.stdin = deps.stdin ?? process.stdin;
    this.io = deps.io ?? consoleIO;
    this.env = deps.env ?? process.env;
    this.readInput = deps.readFile ?? ((path) => readFile(path));
    this.writeOutput = deps.writeFile ?? ((path, data) => writeFile(path, data));
    this.deviceConfig = deps.deviceConfig ?? DEFAULT_DEVICE_CONFIG;
    this.mapConfig = deps.mapConfig ?? DEFAULT_MAP_CONFIG;
    this.normalizer = new ImageNormalizer(
      deps.imageConfig ?? DEFAULT_IMAGE_CONFIG,
      deps.loadEngine ?? loadSharp,
    );
  }

  /**
   * Resolve the endpoint, run the command and map any failure to an exit code
   */
  public async run(invocation: Invocation): Promise<CommandOutcome> {
    try {
      const endpoint = resolveEndpoint(invocation.ip, this.env);
      await this.dispatch(endpoint, invocation);
      return { exitCode: 0 };
    } catch (error) {
      return { exitCode: this.report(error) };
    }
  }

  private dispatch(endpoint: Endpoint, invocation: Invocation): Promise<void> {
    const { command } = invocation;
    const client = new DeviceClient(endpoint, this.fetchFn, this.deviceConfig);

    switch (command.kind) {
      case "text":
        return this.sendText(client, command);
      case "image":
        return this.sendImage(client, command);
      case "stream":
        return this.stream(endpoint, invocation.signal);
      case "map":
        return this.sendMap(client, command);
      case "mqtt":
        return this.configureMqtt(client, command);
      case "retain":
        return this.setRetain(client, command);
      case "screenshot":
        return this.saveScreenshot(client, command);
    }
  }

  private report(error: unknown): number {
    this.io.err(`Error: ${describeError(error)}`);

    if (error instanceof DeliveryError && error.detail) {
      this.io.err(`Detail: ${error.detail}`);
    }
    return exitCodeFor(error);
  }

  private async sendText(
    client: DeviceClient,
    command: Extract<DisplayCommand, { kind: "text" }>,
  ): Promise<void> {
    let text = command.body;
    if (!text) {
      if (!isPiped(this.stdin)) {
        throw new InputError("Provide text as argument or via stdin.");
      }
      text = (await readAll(this.stdin)).toString("utf8").trim();
    }
    if (!text) {
      throw new InputError("No text to send.");
    }

    this.io.out(`Sending text to ${client.url("/text")}...`);
    await client.sendText({ text, size: command.size, clear: true });
    this.io.out("Success!");
  }

  private async sendImage(
    client: DeviceClient,
    command: Extract<DisplayCommand, { kind: "image" }>,
  ): Promise<void> {
    const input = await this.readImage(command.path);
    if (input.length === 0) {
      throw new InputError("Empty input.");
    }

    const image = this.settle(
      await this.normalizer.normalize(
        input,
        { kind: "generic" },
        { forceRaw: command.forceRaw, onProgress: this.io.out },
      ),
    );
    if (image.normalized) {
      this.io.out(`Formatted size: ${image.encodedBytes.length} bytes`);
    }

    this.io.out(
      `Sending ${image.encodedBytes.length} bytes to ${client.url("/image")}...`,
    );
    await client.uploadImage(image.encodedBytes, "image.jpg");
    this.io.out("Success!");
  }

  private async readImage(path: string | undefined): Promise<Buffer> {
    if (path) {
      try {
        return await this.readInput(path);
      } catch (error) {
        if (isMissingFile(error)) {
          throw new InputError(`File not found: ${path}`);
        }
        throw new InputError(`Error reading file: ${describeError(error)}`);
      }
    }

    if (isPiped(this.stdin)) {
      this.io.out("Reading image from stdin...");
      return readAll(this.stdin);
    }

    throw new InputError(
      [
        "Provide an image file or pipe data.",
        "Usage: paperctl image photo.jpg",
        "   OR: cat photo.jpg | paperctl image",
      ].join("\n"),
    );
  }

  private async stream(endpoint: Endpoint, signal?: AbortSignal): Promise<void> {
    const session = new StreamSession(endpoint, this.deviceConfig);

    this.io.out(`Connecting to Stream at ${session.address}...`);
    const summary = await session.run(this.stdin, {
      signal,
      onConnected: () =>
        this.io.out("Connected! Type or pipe text (Ctrl+C to stop)."),
    });

    if (summary.interrupted) {
      this.io.out("\nDisconnected.");
    }
    logger.debug(
      `Streamed ${summary.linesSent} lines (${summary.bytesSent} bytes)`,
    );
  }

  private async sendMap(
    client: DeviceClient,
    command: Extract<DisplayCommand, { kind: "map" }>,
  ): Promise<void> {
    const apiKey = resolveApiKey(command.apiKey, this.env);
    const place = await this.resolvePlace(command);

    const renderer = new MapRenderer(
      client,
      this.normalizer,
      this.fetchFn,
      this.mapConfig,
    );

    this.io.out(
      `Fetching map at (${place.lat}, ${place.lon}) zoom ${place.zoom}...`,
    );
    const image = this.settle(
      await renderer.render(
        { lat: place.lat, lon: place.lon, zoom: place.zoom, apiKey },
        {
          forceRaw: command.forceRaw,
          onProgress: this.io.out,
          onWarning: (message) => this.io.err(`Warning: ${message}`),
        },
      ),
    );

    this.io.out(
      `Sending map (${image.encodedBytes.length} bytes) to ${client.url("/image")}...`,
    );
    await client.uploadImage(image.encodedBytes, "map.jpg");
    this.io.out("Success! Map displayed.");
  }

  private async resolvePlace(
    command: Extract<DisplayCommand, { kind: "map" }>,
  ): Promise<{ lat: number; lon: number; zoom: number }> {
    if (command.location) {
      this.io.out(`Geocoding '${command.location}'...`);
      const geocoder = new Geocoder(this.fetchFn, this.mapConfig);
      const result = await geocoder.resolve(command.location);
      const zoom = command.zoom ?? zoomForPlace(result.boundingBox);

      this.io.out(`Found: ${result.displayLabel}`);
      this.io.out(`Coordinates: ${result.lat}, ${result.lon} (zoom: ${zoom})`);
      return { lat: result.lat, lon: result.lon, zoom };
    }

    if (command.lat === undefined || command.lon === undefined) {
      throw new ConfigurationError(
        "Either --lat and --lon, or --location must be provided.",
      );
    }

    return {
      lat: command.lat,
      lon: command.lon,
      zoom: command.zoom ?? DEFAULT_COORDINATE_ZOOM,
    };
  }

  private async configureMqtt(
    client: DeviceClient,
    command: Extract<DisplayCommand, { kind: "mqtt" }>,
  ): Promise<void> {
    const payload: MqttPayload = {
      broker: command.broker,
      topic: command.topic,
      port: command.port,
    };
    if (command.username) payload.username = command.username;
    if (command.password) payload.password = command.password;

    this.io.out(
      `Connecting device to MQTT broker ${command.broker}:${command.port}...`,
    );
    this.io.out(`Subscribing to topic: ${command.topic}`);

    const result = await client.configureMqtt(payload);

    if (result.connected) {
      this.io.out("Success! Device connected to MQTT broker.");
      this.io.out(`Broker: ${result.broker ?? command.broker}`);
      this.io.out(`Topic: ${result.topic ?? command.topic}`);
      this.io.out("\nDevice will now display messages published to this topic.");
    } else {
      this.io.err("Warning: Connection status unclear.");
      this.io.out(`Response: ${JSON.stringify(result)}`);
    }
  }

  private async setRetain(
    client: DeviceClient,
    command: Extract<DisplayCommand, { kind: "retain" }>,
  ): Promise<void> {
    const result = await client.setRetain(command.enabled);
    this.io.out(`Retain: ${result.retain ? "on" : "off"}`);
  }

  private async saveScreenshot(
    client: DeviceClient,
    command: Extract<DisplayCommand, { kind: "screenshot" }>,
  ): Promise<void> {
    this.io.out(`Downloading screenshot from ${client.url("/screenshot")}...`);
    const bytes = await client.fetchScreenshot();

    try {
      await this.writeOutput(command.output, bytes);
    } catch (error) {
      throw new InputError(
        `Could not write ${command.output}: ${describeError(error)}`,
      );
    }
    this.io.out(`Saved ${bytes.length} bytes to ${command.output}`);
  }

  private settle(result: StageResult<DeviceImage>): DeviceImage {
    const image = unwrap(result, (reason) => this.io.err(`Warning: ${reason}`));

    if (!image.normalized && !MediaDetector.isDeviceNative(image.encodedBytes)) {
      this.io.err(
        `Warning: The device may not be able to draw ${image.mimeType} data.`,
      );
    }
    return image;
  }
}
