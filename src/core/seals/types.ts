/**
 * The seven seal layers used to bucket patterns.
 */

export type SealLayerNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export type SealLayerName =
  | 'IDENTITY'
  | 'STRUCTURE'
  | 'FUNCTION'
  | 'AUTHORITY'
  | 'COMMUNITY'
  | 'WISDOM'
  | 'FULFILLMENT';

/**
 * Documentation metadata for a layer. Never consulted by matching logic.
 */
export interface SealLayer {
  layer: SealLayerNumber;
  name: SealLayerName;
  /** The question this layer answers about a concept */
  description: string;
}
