/**
 * Records one-shot trigger firings so `at` triggers fire once across restarts.
 */
export interface TriggerLedger {
  hasFired(flowId: string, version: string): Promise<boolean>;
  /** Returns false when the firing was already recorded */
  record(flowId: string, version: string, firedAt: number): Promise<boolean>;
}
