/**
 * Stream transform adapter.
 *
 * Drains a byte stream, masks the UTF-8 JSON it carries and hands back
 * a new byte stream. The engine itself never throws in its default
 * fail-open mode, so anything caught here is either an I/O failure on
 * the source or a fail-closed rejection. Both are reported to the
 * calling pipeline and produce no output.
 */

import { Readable, Transform } from "node:stream";
import type { TransformCallback } from "node:stream";

import type { TransformerContext } from "@datamask/core";

import type { MaskingEngine, MaskingStats } from "./engine.js";
import { createStats } from "./engine.js";
import { errorMessage } from "./log.js";

/** Read a stream to completion. Strings are encoded as UTF-8. */
async function drain(input: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

function toByteStream(data: Buffer): Readable {
  return Readable.from(data.length > 0 ? [data] : [], { objectMode: false });
}

/**
 * Mask the JSON document carried by `input`.
 *
 * The caller keeps ownership of `input`; it is fully consumed. Returns
 * a new readable byte stream, or null after reporting a problem through
 * `context`. Empty input yields an empty stream.
 */
export async function maskStream(
  engine: MaskingEngine,
  input: Readable,
  context: TransformerContext,
  stats: MaskingStats = createStats(),
): Promise<Readable | null> {
  let raw: Buffer;
  try {
    raw = await drain(input);
  } catch (err) {
    context.reportProblem(`Failed to read input stream: ${errorMessage(err)}`);
    return null;
  }

  try {
    const masked = engine.maskDocument(raw.toString("utf8"), stats);
    return toByteStream(Buffer.from(masked, "utf8"));
  } catch (err) {
    context.reportProblem(`Data masking failed: ${errorMessage(err)}`);
    return null;
  }
}

/**
 * A Node Transform that buffers everything written to it and emits the
 * masked document once the writable side ends. For use with
 * `stream.pipeline`; errors surface as a pipeline rejection.
 */
export function createMaskingTransform(
  engine: MaskingEngine,
  stats: MaskingStats = createStats(),
): Transform {
  const chunks: Buffer[] = [];

  return new Transform({
    transform(chunk: Buffer | string, encoding: BufferEncoding, callback: TransformCallback) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, encoding) : chunk);
      callback();
    },

    flush(callback: TransformCallback) {
      try {
        const masked = engine.maskDocument(Buffer.concat(chunks).toString("utf8"), stats);
        chunks.length = 0;
        if (masked.length > 0) this.push(Buffer.from(masked, "utf8"));
        callback();
      } catch (err) {
        callback(err instanceof Error ? err : new Error(String(err)));
      }
    },
  });
}

/** A context that records problems instead of forwarding them. */
export interface ProblemCollector extends TransformerContext {
  readonly problems: readonly string[];
}

export function createProblemCollector(): ProblemCollector {
  const problems: string[] = [];
  return {
    problems,
    reportProblem(message: string) {
      problems.push(message);
    },
  };
}
