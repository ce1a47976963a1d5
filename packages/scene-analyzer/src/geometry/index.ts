export { CoordinateNormalizer } from './coordinate-normalizer';
export type { RescaleResult } from './coordinate-normalizer';
