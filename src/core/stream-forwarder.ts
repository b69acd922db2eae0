/**
 * Stream forwarding between an engine attach connection and the caller's
 * stdin/stdout/stderr endpoints.
 *
 * The engine multiplexes stdout and stderr onto one connection as frames:
 * an 8-byte header `[stream, 0, 0, 0, size (uint32 BE)]` then `size`
 * payload bytes. {@link FrameDemuxer} splits them back out, honoring
 * back-pressure on the destination sinks.
 */

import { Writable, type Readable } from 'node:stream';
import type { AttachHandle } from './engine/engine.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Frame demuxing
// ---------------------------------------------------------------------------

export const FRAME_HEADER_BYTES = 8;

export const STREAM_STDIN = 0;
export const STREAM_STDOUT = 1;
export const STREAM_STDERR = 2;
export const STREAM_SYSTEMERR = 3;

export type FrameRoute = (stream: number, payload: Buffer) => Promise<void>;

/** Incremental parser for the engine's multiplexed stream format. */
export class FrameDemuxer {
  private pending: Buffer = Buffer.alloc(0);

  constructor(private readonly route: FrameRoute) {}

  /** Feed raw bytes; complete frames are routed in order. */
  async push(chunk: Buffer): Promise<void> {
    this.pending = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;

    while (this.pending.length >= FRAME_HEADER_BYTES) {
      const size = this.pending.readUInt32BE(4);
      const end = FRAME_HEADER_BYTES + size;
      if (this.pending.length < end) break;

      const stream = this.pending.readUInt8(0);
      const payload = this.pending.subarray(FRAME_HEADER_BYTES, end);
      this.pending = this.pending.subarray(end);
      await this.route(stream, payload);
    }
  }

  /** Bytes held back waiting for the rest of a frame. */
  get buffered(): number {
    return this.pending.length;
  }
}

// ---------------------------------------------------------------------------
// Sink writes
// ---------------------------------------------------------------------------

/** Write honoring back-pressure; closed sinks silently discard. */
export async function writeToSink(sink: Writable | undefined, data: Buffer): Promise<void> {
  if (!sink || sink.destroyed || sink.writableEnded) return;
  if (sink.write(data)) return;
  await new Promise<void>((resolve, reject) => {
    const cleanup = (): void => {
      sink.off('drain', onDrain);
      sink.off('close', onDrain);
      sink.off('error', onError);
    };
    const onDrain = (): void => {
      cleanup();
      resolve();
    };
    const onError = (err: Error): void => {
      cleanup();
      reject(err);
    };
    sink.on('drain', onDrain);
    sink.on('close', onDrain);
    sink.on('error', onError);
  });
}

/** A sink that keeps everything written to it. */
export class MemorySink extends Writable {
  private readonly chunks: Buffer[] = [];

  _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    callback();
  }

  contents(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

// ---------------------------------------------------------------------------
// StreamForwarder
// ---------------------------------------------------------------------------

export interface StreamForwarderOptions {
  attach: AttachHandle;
  stdin?: Readable;
  stdout?: Writable;
  stderr?: Writable;
  /** Tee stderr into an in-memory buffer for error reporting. */
  captureStderr?: boolean;
  /** Called once when output copying ends, with the error that ended it, if any. */
  onOutputClosed?: (err?: Error) => void;
  /** Called once when input copying ends, with the error that ended it, if any. */
  onInputClosed?: (err?: Error) => void;
  logger?: Logger;
}

/**
 * Copies attach output to the caller's sinks and caller stdin to the
 * attach input, each as an independent background task.
 *
 * - `ready` resolves when the output copier makes its first read.
 * - `outputDone` resolves when output copying has ended.
 * - `inputDone` resolves when input copying has ended (immediately when
 *   there is no stdin).
 *
 * None of these promises reject; copy errors go to the close callbacks.
 */
export class StreamForwarder {
  readonly ready: Promise<void>;
  readonly outputDone: Promise<void>;
  readonly inputDone: Promise<void>;

  private readonly options: StreamForwarderOptions;
  private readonly logger: Logger;
  private readonly captured: Buffer[] = [];
  private markReady: () => void = () => undefined;
  private detachInput: () => void = () => undefined;

  constructor(options: StreamForwarderOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger('forwarder');
    this.ready = new Promise<void>((resolve) => {
      this.markReady = resolve;
    });
    this.outputDone = this.copyOutput();
    this.inputDone = this.copyInput();
  }

  /** Stderr bytes seen so far; empty unless capture was requested. */
  capturedStderr(): Buffer {
    return Buffer.concat(this.captured);
  }

  /** Stop forwarding caller stdin; the caller's stream is left open. */
  stopInput(): void {
    this.detachInput();
  }

  // -----------------------------------------------------------------------
  // Output copier
  // -----------------------------------------------------------------------

  private async copyOutput(): Promise<void> {
    const { attach, stdout, stderr, captureStderr } = this.options;
    const demuxer = new FrameDemuxer(async (stream, payload) => {
      switch (stream) {
        case STREAM_STDIN:
        case STREAM_STDOUT:
          await writeToSink(stdout, payload);
          return;
        case STREAM_STDERR:
          if (captureStderr) this.captured.push(Buffer.from(payload));
          await writeToSink(stderr, payload);
          return;
        case STREAM_SYSTEMERR:
          throw new Error(`engine stream error: ${payload.toString('utf-8')}`);
        default:
          throw new Error(`unrecognized stream id ${stream} in attach output`);
      }
    });

    let failure: Error | undefined;
    try {
      this.markReady();
      for await (const chunk of attach.output) {
        await demuxer.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      if (demuxer.buffered > 0) {
        this.logger.debug('attach output ended mid-frame', { bytes: demuxer.buffered });
      }
    } catch (err) {
      failure = err instanceof Error ? err : new Error(String(err));
      this.logger.debug('output copy ended with error', { error: failure });
    }
    this.options.onOutputClosed?.(failure);
  }

  // -----------------------------------------------------------------------
  // Input copier
  // -----------------------------------------------------------------------

  private async copyInput(): Promise<void> {
    const { attach, stdin } = this.options;
    const input = attach.input;
    if (!stdin || !input) return;

    const failure = await new Promise<Error | undefined>((resolve) => {
      if (stdin.readableEnded || stdin.destroyed) {
        resolve(undefined);
        return;
      }
      const onData = (chunk: unknown): void => {
        if (input.destroyed || input.writableEnded) return;
        const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        if (!input.write(data)) {
          stdin.pause();
          input.once('drain', () => stdin.resume());
        }
      };
      const finish = (err?: Error): void => {
        stdin.off('data', onData);
        stdin.off('end', onEnd);
        stdin.off('error', onError);
        input.off('close', onEnd);
        this.detachInput = () => undefined;
        resolve(err);
      };
      const onEnd = (): void => finish();
      const onError = (err: Error): void => finish(err);

      this.detachInput = onEnd;
      stdin.on('data', onData);
      stdin.once('end', onEnd);
      stdin.once('error', onError);
      input.once('close', onEnd);
    });

    if (failure) {
      this.logger.debug('input copy ended with error', { error: failure });
    }
    this.options.onInputClosed?.(failure);
    attach.closeWrite();
  }
}
