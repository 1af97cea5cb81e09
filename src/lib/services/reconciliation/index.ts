export { LineageWriter, newSeatPack } from './lineage-writer';
export type { LineageSkipReason, LineageWriteResult, LineageWriterOptions } from './lineage-writer';
export { PerformanceReconciler } from './reconcile-performance';
export type { PerformanceReconcilerDeps, ReconcileOptions, ReconcileResult } from './reconcile-performance';
export { VenueStructureChangeHandler, detectStructureChange } from './structure-change';
export type { StructureChange, StructureChangeResult } from './structure-change';
export { ManualPackActions } from './manual-actions';
export type { ManualActionResult, ManualPackActionsDeps, PerformanceToggleResult } from './manual-actions';
export { SyncHealthMonitor, healthIssues } from './health';
export type { HealthStatus, StaleOperationCleanup, SyncHealthMonitorDeps, SyncHealthReport } from './health';
export { DEFAULT_RECONCILE_SETTINGS } from './types';
export type { ManualActionFailure, PosSyncMode, ReconcileSettings, SeatSnapshot, SeatSnapshotSource } from './types';
