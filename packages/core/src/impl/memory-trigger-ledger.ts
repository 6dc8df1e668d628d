import type { TriggerLedger } from '../interfaces/trigger-ledger';

export class MemoryTriggerLedger implements TriggerLedger {
  private fired = new Map<string, number>();

  async hasFired(flowId: string, version: string): Promise<boolean> {
    return this.fired.has(`${flowId}@${version}`);
  }

  async record(flowId: string, version: string, firedAt: number): Promise<boolean> {
    const key = `${flowId}@${version}`;
    if (this.fired.has(key)) return false;
    this.fired.set(key, firedAt);
    return true;
  }
}
