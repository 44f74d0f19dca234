// Non domain types

import {Product} from "./domain";

/**
 * A loosely typed record as it arrives from a CSV file, a database row or a
 * JSON payload. `line` is the position reported in warnings.
 */
export type RawRow = {
  readonly line: number;
  readonly fields: Readonly<Record<string, string>>;
};

export type IngestionResult<T> = {
  readonly values: T[];
  readonly warnings: string[];
};

export type CatalogEntry = {
  readonly product: Product;
  readonly unitPrice: number;
};
