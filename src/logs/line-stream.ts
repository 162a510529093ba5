import type { Readable } from "node:stream";
import { TextDecoder } from "node:util";

// A line that grows past this without a newline is cut here: the first
// `maxBuffered` characters are yielded once and the rest is dropped up to the
// next newline.
export const MAX_BUFFERED_LINE_BYTES = 64 * 1024;

// Splits a byte or text stream into lines without reading the whole body.
// The consumer may stop early; the caller owns destroying the stream.
export async function* readLines(
  stream: Readable,
  maxBuffered = MAX_BUFFERED_LINE_BYTES,
): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder("utf-8");
  let pending = "";
  let skipping = false;

  for await (const chunk of stream) {
    pending += decodeChunk(decoder, chunk);

    for (;;) {
      const newline = pending.indexOf("\n");

      if (skipping) {
        if (newline === -1) {
          pending = "";
          break;
        }
        pending = pending.slice(newline + 1);
        skipping = false;
        continue;
      }

      if (newline !== -1) {
        yield stripCarriageReturn(pending.slice(0, newline));
        pending = pending.slice(newline + 1);
        continue;
      }

      if (pending.length > maxBuffered) {
        yield pending.slice(0, maxBuffered);
        pending = "";
        skipping = true;
      }
      break;
    }
  }

  pending += decoder.decode();
  if (!skipping && pending.length > 0) {
    yield stripCarriageReturn(pending);
  }
}

function decodeChunk(decoder: TextDecoder, chunk: unknown): string {
  if (typeof chunk === "string") return chunk;
  if (chunk instanceof Uint8Array) return decoder.decode(chunk, { stream: true });
  throw new TypeError(`Unsupported chunk type in log stream: ${typeof chunk}`);
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}
