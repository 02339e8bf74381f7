// src/core/http/LiveResponse.ts

import type { Readable } from 'stream';
import { NetworkError, StateError, errorMessage } from '../../utils/errors';
import { decodeJson, decodeText, decodeYaml } from '../../utils/decode';

/**
 * The current response of a client. The body is a stream that can either be
 * handed out once (streaming to disk, row parsing) or buffered once and then
 * decoded any number of times.
 */
export class LiveResponse {
  readonly ok: boolean;
  private taken = false;
  private buffered?: Promise<Buffer>;
  private closed = false;
  private textCache?: string;

  constructor(
    readonly url: string,
    readonly status: number,
    readonly headers: Readonly<Record<string, string>>,
    private body: Readable,
    private encoding: BufferEncoding = 'utf8'
  ) {
    this.ok = status >= 200 && status < 300;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isConsumed(): boolean {
    return this.taken;
  }

  getHeader(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  /**
   * Hand the raw body stream to the caller. Only possible once.
   */
  takeStream(): Readable {
    if (this.closed) {
      throw new StateError('Response has been closed', { url: this.url });
    }
    if (this.taken) {
      throw new StateError('Response body has already been consumed', { url: this.url });
    }
    this.taken = true;
    return this.body;
  }

  async buffer(): Promise<Buffer> {
    if (!this.buffered) {
      this.buffered = this.readAll(this.takeStream());
    }
    return this.buffered;
  }

  async text(): Promise<string> {
    if (this.textCache === undefined) {
      this.textCache = decodeText(await this.buffer(), this.encoding);
    }
    return this.textCache;
  }

  async json(): Promise<unknown> {
    return decodeJson(await this.text(), this.url);
  }

  async yaml(): Promise<unknown> {
    return decodeYaml(await this.text(), this.url);
  }

  /**
   * Release the body, including a stream already handed out. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.body.destroy();
  }

  private async readAll(stream: Readable): Promise<Buffer> {
    const chunks: Buffer[] = [];
    try {
      for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
    } catch (error: unknown) {
      throw new NetworkError(`Failed reading response body: ${errorMessage(error)}`, {
        url: this.url,
        cause: error,
      });
    }
    return Buffer.concat(chunks);
  }
}
