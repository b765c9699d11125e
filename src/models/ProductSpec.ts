/**
 * Fixed-income product data structures
 */

export const INDEXER_KINDS = ["fixed", "cdi", "ipca"] as const;

/**
 * fixed: prefixed annual rate
 * cdi: post-fixed, rateParameter is the fraction of CDI
 * ipca: inflation-linked, rateParameter is the real spread over IPCA
 */
export type IndexerKind = (typeof INDEXER_KINDS)[number];

export interface ProductSpec {
  name: string;
  indexerKind: IndexerKind;
  rateParameter: number;
  taxExempt: boolean;
}

/**
 * Product as supplied by untyped callers (HTTP body, JSON file).
 * The engine validates it into a ProductSpec before projecting.
 */
export interface ProductSpecInput {
  name: string;
  indexerKind: string;
  rateParameter: number;
  taxExempt: boolean;
}
