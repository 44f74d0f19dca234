/**
 * EFFECTS LAYER
 *
 * Everything the checkout needs from the outside world, reduced to "give me
 * the rows". Where the rows come from (a CSV file, PostgreSQL, the pricing
 * service) is an implementation detail of the effects; validation of their
 * contents happens in ingestion, not here.
 */

import {RawRow} from '../types';

export interface CatalogSource {
  readonly getCatalogRows: () => Promise<RawRow[]>;
}

export interface OfferSource {
  readonly getOfferRows: () => Promise<RawRow[]>;
}

export type AppEffects = {
  readonly catalog: CatalogSource;
  readonly offers: OfferSource;
}
