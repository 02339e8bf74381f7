// src/core/tabular/RowCursor.ts

import type { HttpClient } from '../http/HttpClient';
import type { LiveResponse } from '../http/LiveResponse';
import { StateError } from '../../utils/errors';

/**
 * Single-pass iterator over the rows of the client's current response.
 * Exhausting, closing or failing the cursor closes the response and frees
 * the client's cursor slot. A newer request on the client invalidates it.
 */
export class RowCursor<R> implements AsyncIterableIterator<R> {
  private finished = false;

  constructor(
    private client: HttpClient,
    private token: symbol,
    private response: LiveResponse,
    private source: AsyncGenerator<R, void, undefined>
  ) {}

  get isOpen(): boolean {
    return !this.finished;
  }

  async next(): Promise<IteratorResult<R, undefined>> {
    if (this.finished) {
      return { done: true, value: undefined };
    }
    if (!this.client.isCursorValid(this.token)) {
      await this.finish();
      throw new StateError('Row cursor was invalidated by a newer request on the same client', {
        url: this.response.url,
      });
    }

    try {
      const result = await this.source.next();
      if (result.done) {
        await this.finish();
        return { done: true, value: undefined };
      }
      return { done: false, value: result.value };
    } catch (error: unknown) {
      await this.finish();
      throw error;
    }
  }

  async return(): Promise<IteratorResult<R, undefined>> {
    await this.finish();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  async close(): Promise<void> {
    await this.finish();
  }

  /**
   * Drain the remaining rows into an array.
   */
  async toArray(): Promise<R[]> {
    const rows: R[] = [];
    for await (const row of this) {
      rows.push(row);
    }
    return rows;
  }

  private async finish(): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    this.client.releaseCursor(this.token);
    this.response.close();
    await this.source.return(undefined);
  }
}
