import { AccessPoint, AccessPointInput, ChangeRecord, GuardrailPolicy } from "../types.js";
import { logger } from "../utils/logger.js";

export class AccessPointNotFoundError extends Error {
  readonly code = "NOT_FOUND";

  constructor(readonly apId: string) {
    super(`Access point '${apId}' not found in network state`);
    this.name = "AccessPointNotFoundError";
  }
}

export type StateAddedListener = (ap: AccessPoint) => void;

export interface NetworkStoreOptions {
  policy: GuardrailPolicy;
  historyLimit?: number;
}

interface StoredAccessPoint {
  ap: Readonly<AccessPoint>;
  history: ChangeRecord[];
}

/**
 * Owns every access point record. Records are replaced wholesale on each change
 * and callers only ever receive copies.
 */
export class NetworkStateStore {
  private readonly records = new Map<string, StoredAccessPoint>();
  private readonly listeners = new Set<StateAddedListener>();
  readonly policy: GuardrailPolicy;
  private readonly historyLimit: number;

  constructor(options: NetworkStoreOptions) {
    this.policy = options.policy;
    this.historyLimit = options.historyLimit ?? 50;
  }

  /** Sentinel that lets the first change through the budget rule at any time >= 0. */
  initialLastChangeTime(): number {
    return -this.policy.change_budget_minutes - 1;
  }

  add(input: AccessPointInput): AccessPoint {
    const ap: AccessPoint = {
      id: input.id,
      channel: input.channel,
      power_db: input.power_db,
      last_change_time_minutes: input.last_change_time_minutes ?? this.initialLastChangeTime()
    };
    this.records.set(ap.id, { ap: Object.freeze({ ...ap }), history: [] });

    logger.info({ ap_id: ap.id, channel: ap.channel, power_db: ap.power_db }, "Access point added");
    // listeners run after the record is stored; their failures are only logged
    for (const listener of this.listeners) {
      try {
        listener({ ...ap });
      } catch (err) {
        logger.error({ err, ap_id: ap.id }, "State added listener failed");
      }
    }
    return { ...ap };
  }

  get(id: string): AccessPoint {
    const found = this.find(id);
    if (!found) throw new AccessPointNotFoundError(id);
    return found;
  }

  find(id: string): AccessPoint | undefined {
    const stored = this.records.get(id);
    return stored ? { ...stored.ap } : undefined;
  }

  list(): AccessPoint[] {
    return [...this.records.values()]
      .map((stored) => ({ ...stored.ap }))
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  size(): number {
    return this.records.size;
  }

  history(id: string): ChangeRecord[] {
    const stored = this.records.get(id);
    if (!stored) throw new AccessPointNotFoundError(id);
    return stored.history.map((entry) => structuredClone(entry));
  }

  commit(next: AccessPoint, change: ChangeRecord): void {
    const stored = this.records.get(next.id);
    if (!stored) throw new AccessPointNotFoundError(next.id);

    const history = [...stored.history, structuredClone(change)].slice(-this.historyLimit);
    this.records.set(next.id, { ap: Object.freeze({ ...next }), history });
  }

  onStateAdded(listener: StateAddedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
