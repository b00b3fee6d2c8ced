// ============================================
// Snapshot Provider Interface
// ============================================

export interface Snapshot {
  /** Roll every participating ledger back to the moment the snapshot was taken */
  restore(): Promise<void>;
}

/**
 * Backends that can undo a failed multi-step operation. The simulated chain
 * implements it; a live chain cannot, so EVM wiring passes none.
 */
export interface ISnapshotProvider {
  takeSnapshot(): Promise<Snapshot>;
}
