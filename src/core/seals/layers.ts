import type { SealLayer, SealLayerNumber } from './types.js';

export const SEAL_LAYER_NUMBERS: readonly SealLayerNumber[] = [1, 2, 3, 4, 5, 6, 7];

export const SEAL_LAYERS: readonly SealLayer[] = [
  { layer: 1, name: 'IDENTITY', description: 'What is this? The essence of the concept.' },
  { layer: 2, name: 'STRUCTURE', description: 'What shape does it take? Models, schemas and layout.' },
  { layer: 3, name: 'FUNCTION', description: 'What does it do? Behaviour and algorithms.' },
  { layer: 4, name: 'AUTHORITY', description: 'Who may reach it? Gates, middleware and access.' },
  { layer: 5, name: 'COMMUNITY', description: 'How does it relate? Integrations and connections.' },
  { layer: 6, name: 'WISDOM', description: 'How does it evolve? Architecture, packaging and change.' },
  { layer: 7, name: 'FULFILLMENT', description: 'What is its complete form? Scale, operations and completion.' },
];

export function isSealLayerNumber(value: number): value is SealLayerNumber {
  return Number.isInteger(value) && value >= 1 && value <= 7;
}

export function getSealLayer(layer: SealLayerNumber): SealLayer {
  return SEAL_LAYERS[layer - 1];
}
