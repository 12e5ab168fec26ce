import { createConnection } from "node:net";
import type { Socket } from "node:net";
import { addAbortSignal } from "node:stream";
import type { Readable } from "node:stream";
import { finished } from "node:stream/promises";
import { once } from "node:events";
import type { DeviceConfig } from "../protocol/index.ts";
import { DEFAULT_DEVICE_CONFIG } from "../protocol/index.ts";
import { DeliveryError, describeError } from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";
import { toBuffer } from "./input.ts";
import type { Endpoint } from "./target-resolver.ts";

const NEWLINE = 0x0a;

export interface StreamOptions {
  /** Aborting ends the session as an operator interrupt */
  signal?: AbortSignal;
  onConnected?: (address: string) => void;
}

export interface StreamSummary {
  linesSent: number;
  bytesSent: number;
  interrupted: boolean;
}

function countLines(bytes: Buffer): number {
  let count = 0;
  for (const byte of bytes) {
    if (byte === NEWLINE) count++;
  }
  return count;
}

/**
 * One-way line stream to the device's raw TCP port.
 *
 * Complete lines are forwarded verbatim as soon as they arrive; a trailing
 * partial line is sent when the input ends. The device never answers.
 */
export class StreamSession {
  constructor(
    private endpoint: Endpoint,
    private config: DeviceConfig = DEFAULT_DEVICE_CONFIG,
  ) {}

  public get address(): string {
    return `${this.endpoint.host}:${this.config.streamPort}`;
  }

  /**
   * Forward `input` line by line until it ends or `signal` aborts
   *
   * @throws DeliveryError when the connection fails or drops
   */
  public async run(
    input: Readable,
    options: StreamOptions = {},
  ): Promise<StreamSummary> {
    const { signal } = options;
    const summary: StreamSummary = {
      linesSent: 0,
      bytesSent: 0,
      interrupted: false,
    };

    let socket: Socket;
    try {
      socket = await this.connect(signal);
    } catch (error) {
      if (signal?.aborted) {
        return { ...summary, interrupted: true };
      }
      throw new DeliveryError(
        `Could not connect to stream at ${this.address}: ${describeError(error)}`,
      );
    }

    logger.info(`Connected to ${this.address}`, LogEventType.STREAM_CONNECTED);
    options.onConnected?.(this.address);

    const failure: { error?: Error } = {};
    const halt = new AbortController();
    let closing = false;

    const lose = (error: Error) => {
      failure.error ??= error;
      halt.abort(error);
      input.destroy(error);
    };
    const interrupt = () => halt.abort(signal?.reason);

    socket.on("error", lose);
    socket.once("close", () => {
      if (!closing) lose(new Error("connection closed by device"));
    });
    // Nothing comes back; reading keeps the peer's hangup observable
    socket.resume();
    if (signal) {
      addAbortSignal(signal, input);
      signal.addEventListener("abort", interrupt, { once: true });
    }

    try {
      let pending: Buffer[] = [];

      for await (const chunk of input) {
        const bytes = toBuffer(chunk);
        const cut = bytes.lastIndexOf(NEWLINE);
        if (cut === -1) {
          pending.push(bytes);
          continue;
        }

        const complete = Buffer.concat([...pending, bytes.subarray(0, cut + 1)]);
        pending = [bytes.subarray(cut + 1)];
        await this.send(socket, complete, halt.signal);
        summary.linesSent += countLines(complete);
        summary.bytesSent += complete.length;
      }

      const rest = Buffer.concat(pending);
      if (rest.length > 0) {
        await this.send(socket, rest, halt.signal);
        summary.linesSent++;
        summary.bytesSent += rest.length;
      }

      closing = true;
      socket.end();
      await finished(socket, { readable: false });
    } catch (error) {
      if (signal?.aborted) {
        summary.interrupted = true;
      } else if (failure.error) {
        throw new DeliveryError(
          `Stream to ${this.address} lost: ${describeError(failure.error)}`,
        );
      } else {
        throw error;
      }
    } finally {
      closing = true;
      signal?.removeEventListener("abort", interrupt);
      socket.destroy();
      logger.info(
        `Stream closed after ${summary.linesSent} lines`,
        LogEventType.STREAM_CLOSED,
        summary,
      );
    }

    return summary;
  }

  private connect(signal?: AbortSignal): Promise<Socket> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const socket = createConnection({
        host: this.endpoint.host,
        port: this.config.streamPort,
      });
      const abandon = () => {
        socket.destroy();
        reject(signal?.reason);
      };
      const fail = (error: Error) => {
        signal?.removeEventListener("abort", abandon);
        reject(error);
      };

      signal?.addEventListener("abort", abandon, { once: true });
      socket.once("error", fail);
      socket.once("connect", () => {
        socket.off("error", fail);
        signal?.removeEventListener("abort", abandon);
        resolve(socket);
      });
    });
  }

  private async send(
    socket: Socket,
    bytes: Buffer,
    signal?: AbortSignal,
  ): Promise<void> {
    if (!socket.write(bytes)) {
      await once(socket, "drain", { signal });
    }
  }
}
