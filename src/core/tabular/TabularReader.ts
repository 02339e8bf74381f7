// src/core/tabular/TabularReader.ts

import { parse, CsvError } from 'csv-parse';
import { Readable } from 'stream';
import type { HttpClient } from '../http/HttpClient';
import type { Logger } from '../../observability/Logger';
import type {
  CellValue,
  DictRow,
  DictRowsOptions,
  HeaderInsertion,
  HeaderSpec,
  KeyColumnOptions,
  ListRow,
  ListRowsOptions,
  RowFunction,
  TabularRows,
} from './types';
import { RowCursor } from './RowCursor';
import { DecodeError, InvalidArgumentError, NetworkError, SDKError, StateError, errorMessage } from '../../utils/errors';

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'];
const SNIFF_LIMIT = 64 * 1024;

type ResolvedHeaderSpec = { kind: 'rows'; rows: number[] } | { kind: 'names'; names: string[]; skipRows: number };

interface RowShaping<R> {
  toRow: (cells: CellValue[], headers: string[]) => R;
  rowFunction?: RowFunction<R>;
  leadingRow?: (headers: string[]) => R;
}

/**
 * Count delimiter candidates on a line, ignoring quoted sections.
 */
export function sniffDelimiter(line: string): string {
  const counts = new Map<string, number>();
  let quoted = false;
  for (const char of line) {
    if (char === '"') {
      quoted = !quoted;
    } else if (!quoted && CANDIDATE_DELIMITERS.includes(char)) {
      counts.set(char, (counts.get(char) ?? 0) + 1);
    }
  }
  let best = ',';
  let bestCount = 0;
  for (const candidate of CANDIDATE_DELIMITERS) {
    const count = counts.get(candidate) ?? 0;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

async function* replay(head: Buffer[], rest: AsyncIterator<unknown>): AsyncGenerator<Buffer> {
  yield* head;
  for (;;) {
    const result = await rest.next();
    if (result.done) return;
    yield toBuffer(result.value);
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk);
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new NetworkError('Unexpected chunk in response body');
}

function toCells(record: unknown): string[] {
  if (!Array.isArray(record)) {
    throw new DecodeError('Tabular parser produced a non-row record');
  }
  return record.map((cell) => (typeof cell === 'string' ? cell : String(cell)));
}

/**
 * Reads delimited tabular data (CSV, TSV and similar) from a url or local
 * path through the bound client, streaming rows without buffering the body.
 *
 * @example
 * ```typescript
 * const reader = new TabularReader(client, logger);
 * const { headers, rows } = await reader.openRows('https://example.com/data.csv', { dictForm: true });
 * for await (const row of rows) {
 *   console.log(row[headers[0]]);
 * }
 * ```
 */
export class TabularReader {
  constructor(
    private client: HttpClient,
    private logger: Logger
  ) {}

  /**
   * Open a row cursor. The returned headers include any insertions.
   *
   * @throws {InvalidArgumentError} for an unusable header specification
   * @throws {StateError} when a cursor is already open on the client
   * @throws {DecodeError} when the source has no header row
   */
  openRows(source: string, options?: ListRowsOptions): Promise<TabularRows<ListRow>>;
  openRows(source: string, options: DictRowsOptions): Promise<TabularRows<DictRow>>;
  async openRows(
    source: string,
    options: ListRowsOptions | DictRowsOptions = {}
  ): Promise<TabularRows<ListRow> | TabularRows<DictRow>> {
    if (options.dictForm === true) {
      return this.open<DictRow>(source, options, {
        toRow: (cells, headers) => {
          const row: DictRow = {};
          headers.forEach((header, index) => {
            row[header] = cells[index] ?? null;
          });
          return row;
        },
        rowFunction: options.rowFunction,
      });
    }
    return this.open<ListRow>(source, options, {
      toRow: (cells) => cells,
      rowFunction: options.rowFunction,
      leadingRow: options.includeHeaders ? (headers) => [...headers] : undefined,
    });
  }

  /**
   * Rows as lists, headers included as the first row unless disabled.
   */
  async getTabularRowsAsList(
    source: string,
    options: Omit<ListRowsOptions, 'dictForm'> = {}
  ): Promise<TabularRows<ListRow>> {
    return this.openRows(source, { includeHeaders: true, ...options, dictForm: false });
  }

  async getTabularRowsAsDict(
    source: string,
    options: Omit<DictRowsOptions, 'dictForm'> = {}
  ): Promise<TabularRows<DictRow>> {
    return this.openRows(source, { ...options, dictForm: true });
  }

  /**
   * Map the first column of a two column source to the second. Rows with
   * fewer than two cells or no key are skipped.
   */
  async downloadTabularKeyValue(
    source: string,
    options: Omit<ListRowsOptions, 'dictForm'> = {}
  ): Promise<Record<string, CellValue>> {
    const { rows } = await this.getTabularRowsAsList(source, options);
    const output: Record<string, CellValue> = {};
    for await (const row of rows) {
      if (row.length < 2) continue;
      const key = row[0];
      if (key === null) continue;
      output[String(key)] = row[1];
    }
    return output;
  }

  /**
   * Key each row by the value of the key column; the other columns become
   * the nested mapping.
   */
  async downloadTabularRowsAsDicts(
    source: string,
    options: Omit<DictRowsOptions, 'dictForm'> & KeyColumnOptions = {}
  ): Promise<Record<string, DictRow>> {
    const { keyColumn = 1, ...rowOptions } = options;
    const { headers, rows } = await this.getTabularRowsAsDict(source, rowOptions);
    const keyHeader = await this.keyHeader(headers, keyColumn, rows);
    const output: Record<string, DictRow> = {};
    for await (const row of rows) {
      const key = row[keyHeader];
      if (key === null || key === undefined) continue;
      const values: DictRow = {};
      for (const [header, value] of Object.entries(row)) {
        if (header !== keyHeader) values[header] = value;
      }
      output[String(key)] = values;
    }
    return output;
  }

  /**
   * Key each non-key column by its header; the nested mapping goes from
   * key column value to cell.
   */
  async downloadTabularColsAsDicts(
    source: string,
    options: Omit<DictRowsOptions, 'dictForm'> & KeyColumnOptions = {}
  ): Promise<Record<string, DictRow>> {
    const { keyColumn = 1, ...rowOptions } = options;
    const { headers, rows } = await this.getTabularRowsAsDict(source, rowOptions);
    const keyHeader = await this.keyHeader(headers, keyColumn, rows);
    const output: Record<string, DictRow> = {};
    for (const header of headers) {
      if (header !== keyHeader) output[header] = {};
    }
    for await (const row of rows) {
      const key = row[keyHeader];
      if (key === null || key === undefined) continue;
      for (const [header, value] of Object.entries(row)) {
        if (header === keyHeader) continue;
        output[header] ??= {};
        output[header][String(key)] = value;
      }
    }
    return output;
  }

  static getColumnPositions(headers: string[]): Record<string, number> {
    const positions: Record<string, number> = {};
    headers.forEach((header, index) => {
      positions[header] = index;
    });
    return positions;
  }

  private async keyHeader<R>(headers: string[], keyColumn: number, rows: RowCursor<R>): Promise<string> {
    const keyHeader = headers[keyColumn - 1];
    if (!Number.isInteger(keyColumn) || keyHeader === undefined) {
      await rows.close();
      throw new InvalidArgumentError(`Key column ${keyColumn} is outside the ${headers.length} headers`);
    }
    return keyHeader;
  }

  private async open<R>(
    source: string,
    options: ListRowsOptions | DictRowsOptions,
    shaping: RowShaping<R>
  ): Promise<TabularRows<R>> {
    const spec = this.resolveHeaderSpec(options.headers ?? 1, options.hasHeader ?? false);
    if (this.client.hasOpenCursor()) {
      throw new StateError('A row cursor is already open on this client', { source });
    }

    const response = await this.client.download(source, options.request);
    const token = this.client.claimCursor();
    const encoding = options.encoding ?? 'utf8';

    try {
      const { delimiter, body } = await this.prepareBody(response.takeStream(), options.delimiter, encoding);
      const parser = parse({
        delimiter,
        encoding,
        bom: true,
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: false,
      });
      body.on('error', (error: Error) => parser.destroy(error));
      body.pipe(parser);

      const records: AsyncIterator<unknown> = parser[Symbol.asyncIterator]();
      const originalHeaders = await this.readHeaders(records, spec, source);
      const headers = this.applyInsertions(originalHeaders, options.headerInsertions);

      this.logger.debug('Opened tabular rows', { source, delimiter, headers });
      const generator = this.generateRows(records, originalHeaders, headers, options.ignoreBlankRows ?? true, shaping, source);
      return { headers, rows: new RowCursor(this.client, token, response, generator) };
    } catch (error: unknown) {
      this.client.releaseCursor(token);
      response.close();
      throw this.toReadError(error, source);
    }
  }

  private resolveHeaderSpec(spec: HeaderSpec, hasHeader: boolean): ResolvedHeaderSpec {
    const isRowNumber = (value: unknown) => typeof value === 'number' && Number.isInteger(value) && value >= 1;

    if (typeof spec === 'number') {
      if (!isRowNumber(spec)) {
        throw new InvalidArgumentError(`Header row must be a positive integer, got ${spec}`);
      }
      return { kind: 'rows', rows: [spec] };
    }
    if (!Array.isArray(spec) || spec.length === 0) {
      throw new InvalidArgumentError('Argument headers cannot be empty!');
    }

    const names: string[] = [];
    const rows: number[] = [];
    for (const entry of spec) {
      if (typeof entry === 'string') {
        names.push(entry);
      } else if (isRowNumber(entry)) {
        rows.push(entry);
      } else {
        throw new InvalidArgumentError(`Header row must be a positive integer, got ${entry}`);
      }
    }
    if (names.length > 0 && rows.length > 0) {
      throw new InvalidArgumentError('Headers must be all row numbers or all column names');
    }
    return names.length > 0 ? { kind: 'names', names, skipRows: hasHeader ? 1 : 0 } : { kind: 'rows', rows };
  }

  /**
   * Peek at the first line to pick a delimiter, then hand back a stream that
   * replays what was read.
   */
  private async prepareBody(
    stream: Readable,
    explicit: string | undefined,
    encoding: BufferEncoding
  ): Promise<{ delimiter: string; body: Readable }> {
    if (explicit) {
      return { delimiter: explicit, body: stream };
    }

    const iterator: AsyncIterator<unknown> = stream[Symbol.asyncIterator]();
    const head: Buffer[] = [];
    let sample = '';
    while (!/[\r\n]/.test(sample) && sample.length < SNIFF_LIMIT) {
      const result = await iterator.next();
      if (result.done) break;
      const chunk = toBuffer(result.value);
      head.push(chunk);
      sample += chunk.toString(encoding);
    }

    const firstLine = sample.replace(/^\uFEFF/, '').split(/\r?\n|\r/)[0] ?? '';
    const body = Readable.from(replay(head, iterator), { objectMode: false });
    body.on('close', () => stream.destroy());
    return { delimiter: sniffDelimiter(firstLine), body };
  }

  private async readHeaders(records: AsyncIterator<unknown>, spec: ResolvedHeaderSpec, source: string): Promise<string[]> {
    if (spec.kind === 'names') {
      for (let skipped = 0; skipped < spec.skipRows; skipped++) {
        const result = await records.next();
        if (result.done) break;
      }
      return [...spec.names];
    }

    const wanted = new Set(spec.rows);
    const lastRow = Math.max(...spec.rows);
    const headerRows: string[][] = [];
    for (let rowNumber = 1; rowNumber <= lastRow; rowNumber++) {
      const result = await records.next();
      if (result.done) {
        throw new DecodeError(`No header row ${rowNumber} in ${source}`, { line: rowNumber }, { source });
      }
      if (wanted.has(rowNumber)) {
        headerRows.push(toCells(result.value));
      }
    }

    const width = Math.max(...headerRows.map((row) => row.length));
    const headers: string[] = [];
    for (let column = 0; column < width; column++) {
      const parts = headerRows.map((row) => (row[column] ?? '').trim()).filter((part) => part !== '');
      headers.push(parts.length > 0 ? parts.join(' ') : `field${column + 1}`);
    }
    return headers;
  }

  private applyInsertions(headers: string[], insertions: HeaderInsertion[] = []): string[] {
    const result = [...headers];
    for (const [position, name] of insertions) {
      result.splice(position, 0, name);
    }
    return result;
  }

  private async *generateRows<R>(
    records: AsyncIterator<unknown>,
    originalHeaders: string[],
    headers: string[],
    ignoreBlankRows: boolean,
    shaping: RowShaping<R>,
    source: string
  ): AsyncGenerator<R, void, undefined> {
    try {
      if (shaping.leadingRow) {
        yield shaping.leadingRow(headers);
      }
      for (;;) {
        let result: IteratorResult<unknown>;
        try {
          result = await records.next();
        } catch (error: unknown) {
          throw this.toReadError(error, source);
        }
        if (result.done) return;

        const raw = toCells(result.value);
        const cells: CellValue[] = originalHeaders.map((_, index) => {
          const cell = raw[index];
          return cell === undefined || cell === '' ? null : cell;
        });
        if (ignoreBlankRows && cells.every((cell) => cell === null)) {
          continue;
        }

        const row = shaping.toRow(cells, originalHeaders);
        if (!shaping.rowFunction) {
          yield row;
          continue;
        }
        const processed = shaping.rowFunction(originalHeaders, row);
        if (processed !== null) {
          yield processed;
        }
      }
    } finally {
      await records.return?.();
    }
  }

  private toReadError(error: unknown, source: string): Error {
    if (error instanceof SDKError) {
      return error;
    }
    if (error instanceof CsvError) {
      const line: unknown = error.lines;
      return new DecodeError(
        `Malformed tabular data in ${source}: ${error.message}`,
        typeof line === 'number' ? { line } : {},
        { source, csvCode: error.code }
      );
    }
    return new NetworkError(`Failed reading ${source}: ${errorMessage(error)}`, { source });
  }
}
