import type { Readable, Writable } from "node:stream";

export function nodeToWebWritable(s: Writable): WritableStream<Uint8Array> {
  return new WritableStream<Uint8Array>({
    write(chunk) {
      return new Promise<void>((resolve, reject) => {
        s.write(Buffer.from(chunk), (err) => (err ? reject(err) : resolve()));
      });
    },
  });
}

export function nodeToWebReadable(s: Readable): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      s.on("data", (chunk: Buffer) => controller.enqueue(new Uint8Array(chunk)));
      s.on("end", () => controller.close());
      s.on("error", (err) => controller.error(err));
    },
  });
}
