export { comparePacks } from './comparator';
export type { CreatedPack, RetainedPack, RemovedPack, ComparisonSummary, PackComparison } from './comparator';
export { packsAreIdentical, sameComposition, samePrice } from './equivalence';
export { buildSyncPlan } from './sync-plan';
export type { SyncAction, SyncPlan } from './sync-plan';
