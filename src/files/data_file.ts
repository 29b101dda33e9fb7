/**
 * Generic data file handle.
 *
 * A handle is bound to one resolved path and one intent. Read handles stream
 * the file (gunzipping GZIPPED specs); write handles stream into a `.tmp`
 * sibling that is renamed into place only once the stream has finished, so an
 * interrupted write never shows up under the versioned name.
 */

import { createReadStream, createWriteStream } from "fs";
import { mkdir, rename, rm } from "fs/promises";
import path from "path";
import type { Readable, Writable } from "stream";
import { finished, pipeline } from "stream/promises";
import { createGunzip, createGzip } from "zlib";

import { DataFileError } from "../engine/errors.js";
import { hasFlag, type FileIntent, type FileSpec } from "../engine/types.js";

export class DataFile {
  constructor(
    readonly path: string,
    readonly intent: FileIntent,
    readonly spec: FileSpec,
  ) {}

  getPath(): string {
    return this.path;
  }

  isBinary(): boolean {
    return hasFlag(this.spec, "binary");
  }

  isGzipped(): boolean {
    return hasFlag(this.spec, "gzipped");
  }

  isDirectory(): boolean {
    return hasFlag(this.spec, "directory");
  }

  protected assertIntent(intent: FileIntent): void {
    if (this.intent !== intent) {
      throw new DataFileError(this.path, `File opened for ${this.intent} cannot be used for ${intent}`);
    }
  }

  private assertStreamable(): void {
    if (this.isDirectory()) {
      throw new DataFileError(this.path, "Cannot open a directory as a stream");
    }
  }

  createReadStream(): Readable {
    this.assertIntent("read");
    this.assertStreamable();
    const file = createReadStream(this.path);
    if (!this.isGzipped()) return file;

    const gunzip = createGunzip();
    file.on("error", (err) => gunzip.destroy(err));
    return file.pipe(gunzip);
  }

  async withReadStream<T>(fn: (stream: Readable) => Promise<T> | T): Promise<T> {
    const stream = this.createReadStream();
    try {
      return await fn(stream);
    } finally {
      stream.destroy();
    }
  }

  async withWriteStream<T>(fn: (stream: Writable) => Promise<T> | T): Promise<T> {
    this.assertIntent("write");
    this.assertStreamable();

    const tmpPath = `${this.path}.tmp`;
    await mkdir(path.dirname(this.path), { recursive: true });

    const file = createWriteStream(tmpPath);
    const closed = new Promise<void>((resolve) => file.once("close", () => resolve()));
    const gzip = this.isGzipped() ? createGzip() : undefined;
    const sink: Writable = gzip ?? file;
    // Resolves to the stream error, if any, so a failure that happens while
    // `fn` is still running is never left unobserved.
    const settled = (gzip ? pipeline(gzip, file) : finished(file)).then(
      () => undefined,
      (err: unknown) => err ?? new DataFileError(this.path, "Write stream failed"),
    );

    let result: T;
    try {
      result = await fn(sink);
    } catch (err) {
      sink.destroy();
      await settled;
      await closed;
      await rm(tmpPath, { force: true });
      throw err;
    }

    sink.end();
    const failure = await settled;
    if (failure !== undefined) {
      file.destroy();
      await closed;
      await rm(tmpPath, { force: true });
      throw failure;
    }
    await rename(tmpPath, this.path);
    return result;
  }

  async readBuffer(): Promise<Buffer> {
    return this.withReadStream(async (stream) => {
      const chunks: Buffer[] = [];
      for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      return Buffer.concat(chunks);
    });
  }

  async readText(): Promise<string> {
    return (await this.readBuffer()).toString("utf-8");
  }

  async writeBuffer(data: Uint8Array): Promise<void> {
    await this.withWriteStream((stream) => writeChunk(stream, data));
  }

  async writeText(text: string): Promise<void> {
    await this.withWriteStream((stream) => writeChunk(stream, text));
  }

  /** Create the directory behind a DIRECTORY spec. */
  async makeDirectory(): Promise<void> {
    this.assertIntent("write");
    if (!this.isDirectory()) {
      throw new DataFileError(this.path, "Not a directory spec");
    }
    await mkdir(this.path, { recursive: true });
  }
}

/** Write one chunk, waiting for the stream to drain when its buffer is full. */
export async function writeChunk(stream: Writable, chunk: string | Uint8Array): Promise<void> {
  if (stream.write(chunk)) return;
  await new Promise<void>((resolve, reject) => {
    const onDrain = () => {
      stream.off("error", onError);
      resolve();
    };
    const onError = (err: Error) => {
      stream.off("drain", onDrain);
      reject(err);
    };
    stream.once("drain", onDrain);
    stream.once("error", onError);
  });
}
