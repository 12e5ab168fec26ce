import type { Readable } from "node:stream";

/**
 * Standard input as the commands see it; `isTTY` is set when an operator
 * is typing rather than piping
 */
export type InputStream = Readable & { isTTY?: boolean };

export function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk, "utf8");
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk), "utf8");
}

/**
 * True when input is piped or redirected
 */
export function isPiped(input: InputStream): boolean {
  return input.isTTY !== true;
}

/**
 * Read a stream to its end
 */
export async function readAll(input: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(toBuffer(chunk));
  }
  return Buffer.concat(chunks);
}
