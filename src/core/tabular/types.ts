// src/core/tabular/types.ts

import type { RequestOptions } from '../http/types';
import type { RowCursor } from './RowCursor';

export type CellValue = string | number | boolean | null;

export type ListRow = CellValue[];

export type DictRow = Record<string, CellValue>;

/**
 * A 1-based header row number, several row numbers for multi-line headers,
 * or the column names themselves.
 */
export type HeaderSpec = number | number[] | string[];

export type HeaderInsertion = [position: number, name: string];

/**
 * Called with the headers as read from the source (before insertions).
 * Returning null drops the row.
 */
export type RowFunction<R> = (headers: string[], row: R) => R | null;

interface BaseRowsOptions {
  headers?: HeaderSpec;
  /** With explicit column names, skip the first row of the source */
  hasHeader?: boolean;
  headerInsertions?: HeaderInsertion[];
  ignoreBlankRows?: boolean;
  /** Explicit delimiter; sniffed from the first line when absent */
  delimiter?: string;
  encoding?: BufferEncoding;
  request?: RequestOptions;
}

export interface ListRowsOptions extends BaseRowsOptions {
  dictForm?: false;
  includeHeaders?: boolean;
  rowFunction?: RowFunction<ListRow>;
}

export interface DictRowsOptions extends BaseRowsOptions {
  dictForm: true;
  rowFunction?: RowFunction<DictRow>;
}

export interface TabularRows<R> {
  headers: string[];
  rows: RowCursor<R>;
}

export interface KeyColumnOptions {
  /** 1-based column holding the keys */
  keyColumn?: number;
}
