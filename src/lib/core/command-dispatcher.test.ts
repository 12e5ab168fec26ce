import { describe, test, expect, vi } from "vitest";
import { createServer } from "node:net";
import { PassThrough, Readable } from "node:stream";
import sharp from "sharp";
import { CommandDispatcher } from "./command-dispatcher.ts";
import type { DispatcherDeps, DisplayCommand } from "./command-dispatcher.ts";
import { fakeFetch, jsonBody, jsonResponse } from "./testing/fake-fetch.ts";
import type { RecordedRequest, Responder } from "./testing/fake-fetch.ts";
import { DEFAULT_DEVICE_CONFIG } from "../protocol/index.ts";

const IP = "10.0.0.5";

function stdinOf(chunks: string[], isTTY = false) {
  return Object.assign(Readable.from(chunks.map((c) => Buffer.from(c))), {
    isTTY,
  });
}

async function png(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 30, g: 90, b: 160 },
    },
  })
    .png()
    .toBuffer();
}

function harness(respond?: Responder, deps: DispatcherDeps = {}) {
  const fake = fakeFetch(respond);
  const out: string[] = [];
  const err: string[] = [];
  const dispatcher = new CommandDispatcher({
    fetchFn: fake.fetchFn,
    stdin: stdinOf([], true),
    io: { out: (line) => out.push(line), err: (line) => err.push(line) },
    env: {},
    loadEngine: async () => sharp,
    ...deps,
  });

  const run = (
    command: DisplayCommand,
    target: { ip?: string; signal?: AbortSignal } = { ip: IP },
  ) => dispatcher.run({ command, ...target });

  return { run, requests: fake.requests, out, err };
}

function isDevice(request: RecordedRequest, path: string): boolean {
  return request.url.hostname === IP && request.url.pathname === path;
}

async function uploadedPart(request: RecordedRequest | undefined): Promise<Buffer> {
  const body = request?.body;
  if (!(body instanceof FormData)) throw new Error("Expected multipart body");
  const part = body.get("file");
  if (!(part instanceof Blob)) throw new Error("Expected a file part");
  return Buffer.from(await part.arrayBuffer());
}

describe("CommandDispatcher", () => {
  describe("endpoint resolution", () => {
    test("missing address exits 1 before any request", async () => {
      const { run, requests, err } = harness();

      const outcome = await run({ kind: "text", body: "hi", size: 3 }, {});

      expect(outcome.exitCode).toBe(1);
      expect(requests).toHaveLength(0);
      expect(err).toEqual([
        "Error: Device IP must be provided via --ip or PAPER_IP environment variable.",
      ]);
    });

    test("PAPER_IP is used when --ip is absent", async () => {
      const { run, requests } = harness(undefined, { env: { PAPER_IP: "10.0.0.9" } });

      await run({ kind: "text", body: "hi", size: 3 }, {});

      expect(requests[0]?.url.href).toBe("http://10.0.0.9/api/text");
    });
  });

  describe("text", () => {
    test("posts text, size and clear", async () => {
      const { run, requests, out } = harness();

      const outcome = await run({ kind: "text", body: "Hello", size: 4 });

      expect(outcome.exitCode).toBe(0);
      expect(jsonBody(requests[0])).toEqual({ text: "Hello", size: 4, clear: true });
      expect(out).toEqual(["Sending text to http://10.0.0.5/api/text...", "Success!"]);
    });

    test("reads trimmed text from piped stdin", async () => {
      const { run, requests } = harness(undefined, {
        stdin: stdinOf(["  line one\n", "line two \n"]),
      });

      await run({ kind: "text", size: 3 });

      expect(jsonBody(requests[0])).toEqual({
        text: "line one\nline two",
        size: 3,
        clear: true,
      });
    });

    test("interactive stdin without text exits 1", async () => {
      const { run, requests, err } = harness();

      const outcome = await run({ kind: "text", size: 3 });

      expect(outcome.exitCode).toBe(1);
      expect(requests).toHaveLength(0);
      expect(err).toEqual(["Error: Provide text as argument or via stdin."]);
    });

    test("device rejection is printed and exits 0", async () => {
      const { run, err } = harness(() => jsonResponse({ error: "busy" }, 500));

      const outcome = await run({ kind: "text", body: "Hello", size: 3 });

      expect(outcome.exitCode).toBe(0);
      expect(err).toEqual([
        "Error: Device rejected POST /text: HTTP 500",
        "Detail: busy",
      ]);
    });
  });

  describe("image", () => {
    test("empty piped stdin exits 1 without a request", async () => {
      const { run, requests, err } = harness(undefined, { stdin: stdinOf([]) });

      const outcome = await run({ kind: "image", forceRaw: false });

      expect(outcome.exitCode).toBe(1);
      expect(requests).toHaveLength(0);
      expect(err).toEqual(["Error: Empty input."]);
    });

    test("no path and interactive stdin exits 1 with usage", async () => {
      const { run, requests, err } = harness();

      const outcome = await run({ kind: "image", forceRaw: false });

      expect(outcome.exitCode).toBe(1);
      expect(requests).toHaveLength(0);
      expect(err[0]).toBe(
        "Error: Provide an image file or pipe data.\nUsage: paperctl image photo.jpg\n   OR: cat photo.jpg | paperctl image",
      );
    });

    test("missing file exits 1", async () => {
      const { run, err } = harness(undefined, {
        readFile: async () => {
          throw Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });
        },
      });

      const outcome = await run({ kind: "image", path: "nope.jpg", forceRaw: false });

      expect(outcome.exitCode).toBe(1);
      expect(err).toEqual(["Error: File not found: nope.jpg"]);
    });

    test("normalizes a file and uploads it as JPEG", async () => {
      const source = await png(1920, 1080);
      const { run, requests, out } = harness(undefined, {
        readFile: async () => source,
      });

      const outcome = await run({ kind: "image", path: "photo.png", forceRaw: false });

      expect(outcome.exitCode).toBe(0);
      expect(requests).toHaveLength(1);
      expect(requests[0]?.url.pathname).toBe("/api/image");

      const uploaded = await uploadedPart(requests[0]);
      const metadata = await sharp(uploaded).metadata();
      expect(metadata.format).toBe("jpeg");
      expect(metadata.width).toBe(960);
      expect(metadata.height).toBe(540);
      expect(out[0]).toBe("Processing: Original 1920x1080 -> Max 960x960");
      expect(out.at(-1)).toBe("Success!");
    });

    test("without an engine the upload is refused unless forced", async () => {
      const source = Buffer.from("not really an image");
      const deps: DispatcherDeps = {
        readFile: async () => source,
        loadEngine: async () => null,
      };

      const refused = harness(undefined, deps);
      const refusedOutcome = await refused.run({
        kind: "image",
        path: "x.bin",
        forceRaw: false,
      });
      expect(refusedOutcome.exitCode).toBe(1);
      expect(refused.requests).toHaveLength(0);

      const forced = harness(undefined, deps);
      const forcedOutcome = await forced.run({
        kind: "image",
        path: "x.bin",
        forceRaw: true,
      });
      expect(forcedOutcome.exitCode).toBe(0);
      expect(await uploadedPart(forced.requests[0])).toEqual(source);
      expect(forced.err).toEqual([
        "Warning: Image processing is unavailable; the device requires images within 960x960. Proceeding with raw upload (--force-raw).",
        "Warning: The device may not be able to draw application/octet-stream data.",
      ]);
    });
  });

  describe("map", () => {
    async function mapService(options: {
      screen?: { screen_width: number; screen_height: number };
      tileStatus?: number;
      boundingbox?: string[];
    }) {
      const tile = await png(160, 96);
      const responder: Responder = (request) => {
        if (isDevice(request, "/api/status")) {
          return jsonResponse({ mode: "IDLE", heap_free: 1, ...options.screen });
        }
        if (request.url.hostname === "nominatim.openstreetmap.org") {
          return jsonResponse([
            {
              display_name: "Berlin, Deutschland",
              lat: "52.5",
              lon: "13.4",
              boundingbox: options.boundingbox,
            },
          ]);
        }
        if (request.url.hostname === "tiles.stadiamaps.com") {
          return options.tileStatus
            ? new Response("", { status: options.tileStatus })
            : new Response(new Uint8Array(tile));
        }
        return jsonResponse({});
      };
      return responder;
    }

    const findTile = (requests: RecordedRequest[]) =>
      requests.find((r) => r.url.hostname === "tiles.stadiamaps.com");

    test("explicit coordinates skip the geocoder", async () => {
      const { run, requests, out } = harness(await mapService({}));

      const outcome = await run({
        kind: "map",
        lat: 52.5,
        lon: 13.4,
        zoom: 10,
        apiKey: "test-key",
        forceRaw: false,
      });

      expect(outcome.exitCode).toBe(0);
      expect(
        requests.filter((r) => r.url.hostname === "nominatim.openstreetmap.org"),
      ).toHaveLength(0);
      expect(findTile(requests)?.url.searchParams.get("zoom")).toBe("10");
      expect(out.at(-1)).toBe("Success! Map displayed.");
    });

    test("coordinates without zoom use the coordinate default", async () => {
      const { run, requests } = harness(await mapService({}));

      await run({ kind: "map", lat: 1, lon: 2, apiKey: "test-key", forceRaw: false });

      expect(findTile(requests)?.url.searchParams.get("zoom")).toBe("15");
    });

    test("location with a 0.5 degree box is sized for the device", async () => {
      const { run, requests, out } = harness(
        await mapService({
          screen: { screen_width: 800, screen_height: 480 },
          boundingbox: ["52.25", "52.75", "13.25", "13.75"],
        }),
      );

      const outcome = await run({
        kind: "map",
        location: "Berlin, Germany",
        apiKey: "test-key",
        forceRaw: false,
      });

      expect(outcome.exitCode).toBe(0);
      const tile = findTile(requests);
      expect(tile?.url.searchParams.get("zoom")).toBe("13");
      expect(tile?.url.searchParams.get("size")).toBe("800x480@2x");
      expect(tile?.url.searchParams.get("center")).toBe("52.5,13.5");
      expect(out).toContain("Found: Berlin, Deutschland");

      const upload = requests.find((r) => isDevice(r, "/api/image"));
      const metadata = await sharp(await uploadedPart(upload)).metadata();
      expect(metadata.width).toBe(800);
      expect(metadata.height).toBe(480);
    });

    test("API key falls back to STADIA_API_KEY", async () => {
      const { run, requests } = harness(await mapService({}), {
        env: { STADIA_API_KEY: "env-key" },
      });

      await run({ kind: "map", lat: 1, lon: 2, forceRaw: false });

      expect(findTile(requests)?.url.searchParams.get("api_key")).toBe("env-key");
    });

    test("missing API key exits 1 before any request", async () => {
      const { run, requests } = harness(await mapService({}));

      const outcome = await run({ kind: "map", lat: 1, lon: 2, forceRaw: false });

      expect(outcome.exitCode).toBe(1);
      expect(requests).toHaveLength(0);
    });

    test("neither coordinates nor location exits 1", async () => {
      const { run, requests, err } = harness(await mapService({}));

      const outcome = await run({
        kind: "map",
        lat: 52.5,
        apiKey: "test-key",
        forceRaw: false,
      });

      expect(outcome.exitCode).toBe(1);
      expect(requests).toHaveLength(0);
      expect(err).toEqual([
        "Error: Either --lat and --lon, or --location must be provided.",
      ]);
    });

    test("rejected API key never reaches the device", async () => {
      const { run, requests, err } = harness(await mapService({ tileStatus: 401 }));

      const outcome = await run({
        kind: "map",
        lat: 1,
        lon: 2,
        apiKey: "test-key",
        forceRaw: false,
      });

      expect(outcome.exitCode).toBe(1);
      expect(err).toEqual(["Error: Invalid API key."]);
      expect(requests.filter((r) => r.method === "POST")).toHaveLength(0);
    });
  });

  describe("mqtt", () => {
    test("unconfirmed connection warns and exits 0", async () => {
      const { run, requests, out, err } = harness(() =>
        jsonResponse({ connected: false }),
      );

      const outcome = await run({
        kind: "mqtt",
        broker: "broker.local",
        topic: "paper/display",
        port: 1883,
      });

      expect(outcome.exitCode).toBe(0);
      expect(jsonBody(requests[0])).toEqual({
        broker: "broker.local",
        topic: "paper/display",
        port: 1883,
      });
      expect(err).toEqual(["Warning: Connection status unclear."]);
      expect(out.at(-1)).toBe('Response: {"connected":false}');
    });

    test("credentials are sent when given and echoed fields reported", async () => {
      const { run, requests, out } = harness(() =>
        jsonResponse({
          status: "ok",
          connected: true,
          broker: "broker.local",
          topic: "paper/display",
        }),
      );

      await run({
        kind: "mqtt",
        broker: "broker.local",
        topic: "paper/display",
        port: 8883,
        username: "paper",
        password: "test-secret",
      });

      expect(jsonBody(requests[0])).toEqual({
        broker: "broker.local",
        topic: "paper/display",
        port: 8883,
        username: "paper",
        password: "test-secret",
      });
      expect(out).toContain("Broker: broker.local");
      expect(out).toContain("Topic: paper/display");
    });
  });

  test("retain reports the new state", async () => {
    const { run, requests, out } = harness(() => jsonResponse({ retain: true }));

    await run({ kind: "retain", enabled: true });

    expect(jsonBody(requests[0])).toEqual({ retain: true });
    expect(out).toEqual(["Retain: on"]);
  });

  test("screenshot is written to the output path", async () => {
    const bmp = Buffer.from([0x42, 0x4d, 1, 2, 3]);
    const written: Array<[string, Buffer]> = [];
    const { run, out } = harness(() => new Response(new Uint8Array(bmp)), {
      writeFile: async (path, data) => {
        written.push([path, data]);
      },
    });

    const outcome = await run({ kind: "screenshot", output: "shot.bmp" });

    expect(outcome.exitCode).toBe(0);
    expect(written).toEqual([["shot.bmp", bmp]]);
    expect(out.at(-1)).toBe("Saved 5 bytes to shot.bmp");
  });

  test("stream forwards stdin to the stream port", async () => {
    const chunks: Buffer[] = [];
    let closed: () => void = () => {};
    const disconnected = new Promise<void>((resolve) => {
      closed = resolve;
    });
    const server = createServer((socket) => {
      socket.on("data", (data) => chunks.push(data));
      socket.on("close", () => closed());
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Expected a TCP address");
    }

    const { run, out } = harness(undefined, {
      stdin: stdinOf(["tick 1\n", "tick 2\n"]),
      deviceConfig: { ...DEFAULT_DEVICE_CONFIG, streamPort: address.port },
    });

    const outcome = await run({ kind: "stream" }, { ip: "127.0.0.1" });
    await disconnected;
    await new Promise<void>((resolve) => server.close(() => resolve()));

    expect(outcome.exitCode).toBe(0);
    expect(Buffer.concat(chunks).toString("utf8")).toBe("tick 1\ntick 2\n");
    expect(out).toEqual([
      `Connecting to Stream at 127.0.0.1:${address.port}...`,
      "Connected! Type or pipe text (Ctrl+C to stop).",
    ]);
  });

  test("interrupting a stream reports a clean disconnect", async () => {
    const chunks: Buffer[] = [];
    const server = createServer((socket) => {
      socket.on("data", (data) => chunks.push(data));
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Expected a TCP address");
    }
    const stdin = Object.assign(new PassThrough(), { isTTY: false });
    const controller = new AbortController();

    const { run, out, err } = harness(undefined, {
      stdin,
      deviceConfig: { ...DEFAULT_DEVICE_CONFIG, streamPort: address.port },
    });

    const running = run(
      { kind: "stream" },
      { ip: "127.0.0.1", signal: controller.signal },
    );
    stdin.write("line\n");
    await vi.waitFor(() =>
      expect(Buffer.concat(chunks).toString("utf8")).toBe("line\n"),
    );
    controller.abort();

    const outcome = await running;
    await new Promise<void>((resolve) => server.close(() => resolve()));

    expect(outcome.exitCode).toBe(0);
    expect(err).toEqual([]);
    expect(out).toEqual([
      `Connecting to Stream at 127.0.0.1:${address.port}...`,
      "Connected! Type or pipe text (Ctrl+C to stop).",
      "\nDisconnected.",
    ]);
  });
});
