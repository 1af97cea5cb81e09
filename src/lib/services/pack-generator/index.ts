export { generatePacks, findContiguousRuns } from './generator';
export type { GenerationInput, GenerationOptions } from './generator';
export { generatePackId, packHashInput, resolveSourcePrefix, UNKNOWN_SOURCE_PREFIX } from './pack-id';
export type { PackIdentity } from './pack-id';
export { pricePack, applyMarkup } from './pricing';
export type { PackPrice } from './pricing';
export { detectRowScheme, detectVenueSeatStructure } from './scheme-detector';
export type { RowSchemeVerdict, VenueSchemeDetection } from './scheme-detector';
