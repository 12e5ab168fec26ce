import { Command } from "commander";
import { CommandDispatcher } from "../lib/core/command-dispatcher.ts";
import type { DisplayCommand } from "../lib/core/command-dispatcher.ts";
import { DEFAULT_MQTT_PORT, DEFAULT_TEXT_SIZE } from "../lib/protocol/index.ts";
import { LogLevel, logger } from "../lib/utils/logger.ts";
import {
  parseLatitude,
  parseLongitude,
  parsePort,
  parseSwitch,
  parseTextSize,
  parseZoom,
} from "./parsers.ts";
import type {
  GlobalOptions,
  ImageOptions,
  MapOptions,
  MqttOptions,
  TargetOptions,
  TextOptions,
} from "./types.ts";

const IP_HELP = "Device IP address (overrides PAPER_IP env var)";

async function dispatch(
  command: DisplayCommand,
  ip: string | undefined,
  signal?: AbortSignal,
): Promise<void> {
  const { exitCode } = await new CommandDispatcher().run({
    command,
    ip,
    signal,
  });
  process.exitCode = exitCode;
}

export function setupCLI() {
  const program = new Command();

  program
    .name("paperctl")
    .description("Command-line client for M5Stack PaperS3 e-ink displays")
    .version("1.0.0")
    .option("-v, --verbose", "Show detailed logs including HTTP requests", false)
    .hook("preAction", () => {
      if (program.opts<GlobalOptions>().verbose) {
        logger.setLevel(LogLevel.DEBUG);
      }
    });

  program
    .command("text [payload]")
    .description("Send text to the display (reads stdin when omitted)")
    .option("--size <n>", "Text size", parseTextSize, DEFAULT_TEXT_SIZE)
    .option("--ip <address>", IP_HELP)
    .action(async (payload: string | undefined, options: TextOptions) => {
      await dispatch(
        { kind: "text", body: payload, size: options.size },
        options.ip,
      );
    });

  program
    .command("image [payload]")
    .description("Send an image file (reads stdin when omitted)")
    .option(
      "--force-raw",
      "Send the image unchanged when image processing is unavailable",
      false,
    )
    .option("--ip <address>", IP_HELP)
    .action(async (payload: string | undefined, options: ImageOptions) => {
      await dispatch(
        { kind: "image", path: payload, forceRaw: options.forceRaw },
        options.ip,
      );
    });

  program
    .command("stream")
    .description("Stream stdin to the display line by line (e.g. tail -f)")
    .option("--ip <address>", IP_HELP)
    .action(async (options: TargetOptions) => {
      const controller = new AbortController();
      const interrupt = () => controller.abort();
      process.once("SIGINT", interrupt);

      try {
        await dispatch({ kind: "stream" }, options.ip, controller.signal);
      } finally {
        process.off("SIGINT", interrupt);
      }
    });

  program
    .command("map")
    .description("Display a map at given coordinates or location")
    .option("--lat <degrees>", "Latitude", parseLatitude)
    .option("--lon <degrees>", "Longitude", parseLongitude)
    .option(
      "--location <name>",
      "Location name to geocode (e.g. 'Berlin, Germany')",
    )
    .option(
      "--zoom <level>",
      "Zoom level (0-20, default based on location type)",
      parseZoom,
    )
    .option(
      "--api-key <key>",
      "Stadia Maps API key (or set STADIA_API_KEY env var)",
    )
    .option(
      "--force-raw",
      "Send the map unchanged when image processing is unavailable",
      false,
    )
    .option("--ip <address>", IP_HELP)
    .action(async (options: MapOptions) => {
      await dispatch(
        {
          kind: "map",
          lat: options.lat,
          lon: options.lon,
          location: options.location,
          zoom: options.zoom,
          apiKey: options.apiKey,
          forceRaw: options.forceRaw,
        },
        options.ip,
      );
    });

  program
    .command("mqtt")
    .description("Subscribe the device to an MQTT topic and display messages")
    .requiredOption("--topic <topic>", "MQTT topic to subscribe to")
    .requiredOption("--broker <host>", "MQTT broker hostname or IP")
    .option("--port <port>", "MQTT broker port", parsePort, DEFAULT_MQTT_PORT)
    .option("--username <name>", "MQTT username (optional)")
    .option("--password <password>", "MQTT password (optional)")
    .option("--ip <address>", IP_HELP)
    .action(async (options: MqttOptions) => {
      await dispatch(
        {
          kind: "mqtt",
          broker: options.broker,
          topic: options.topic,
          port: options.port,
          username: options.username,
          password: options.password,
        },
        options.ip,
      );
    });

  program
    .command("retain")
    .description("Keep content on screen across sleep (toggles when omitted)")
    .argument("[state]", "on or off", parseSwitch)
    .option("--ip <address>", IP_HELP)
    .action(async (state: boolean | undefined, options: TargetOptions) => {
      await dispatch({ kind: "retain", enabled: state }, options.ip);
    });

  program
    .command("screenshot")
    .description("Save the current screen contents")
    .argument("[output]", "Output file", "screenshot.bmp")
    .option("--ip <address>", IP_HELP)
    .action(async (output: string, options: TargetOptions) => {
      await dispatch({ kind: "screenshot", output }, options.ip);
    });

  program
    .command("status")
    .description("Show device status")
    .option("--ip <address>", IP_HELP)
    .action(async (options: TargetOptions) => {
      const { verbose } = program.opts<GlobalOptions>();

      const { StatusApp } = await import("../components/StatusApp.tsx");
      const { render } = await import("ink");
      const { waitUntilExit } = render(
        <StatusApp options={{ ip: options.ip, verbose }} />,
      );
      await waitUntilExit();
    });

  return program;
}
