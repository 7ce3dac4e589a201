import { createReadStream } from 'node:fs';

import type { RenderedContent } from './transformerTypes.js';

export interface OutputSink {
  write(chunk: string | Uint8Array): Promise<void>;
}

export function createStreamSink(stream: NodeJS.WritableStream): OutputSink {
  return {
    write(chunk) {
      return new Promise((resolve, reject) => {
        stream.write(chunk, (error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  };
}

export async function streamFileTo(path: string, sink: OutputSink): Promise<void> {
  const stream = createReadStream(path);
  for await (const chunk of stream) {
    if (chunk instanceof Uint8Array) {
      await sink.write(chunk);
    }
  }
}

const LINE_BATCH_BYTES = 64 * 1024;

/** Newline-terminated lines joined into chunks of roughly 64 KiB. */
export function* lineBatches(lines: readonly string[]): Generator<string> {
  let batch = '';
  for (const line of lines) {
    batch += `${line}\n`;
    if (batch.length >= LINE_BATCH_BYTES) {
      yield batch;
      batch = '';
    }
  }
  if (batch) {
    yield batch;
  }
}

export async function writeContent(sink: OutputSink, content: RenderedContent): Promise<void> {
  if (typeof content === 'string' || content instanceof Uint8Array) {
    await sink.write(content);
    return;
  }
  for (const batch of lineBatches(content)) {
    await sink.write(batch);
  }
}
