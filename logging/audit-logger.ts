export type AuditEventType = 'goal_transition' | 'battle_event' | 'navigation_event' | 'error';

export interface AuditLogEntry {
  timestamp: number;
  tick?: number;
  eventType: AuditEventType;
  data: Record<string, unknown>;
}

export interface AuditLogger {
  log(entry: AuditLogEntry): void | Promise<void>;
}

export class ConsoleAuditLogger implements AuditLogger {
  log(entry: AuditLogEntry): void {
    const logLine = JSON.stringify({
      ...entry,
      timestamp: new Date(entry.timestamp).toISOString()
    });
    console.log(`[AUDIT] ${logLine}`);
  }
}

/**
 * Keeps entries in memory, newest last. Used by the status server and tests.
 * Oldest entries are dropped once `maxEntries` is reached.
 */
export class InMemoryAuditLogger implements AuditLogger {
  private readonly entries: AuditLogEntry[] = [];

  constructor(private readonly maxEntries: number = 500) {}

  log(entry: AuditLogEntry): void {
    this.entries.push({ ...entry, data: { ...entry.data } });
    while (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  list(eventType?: AuditEventType): AuditLogEntry[] {
    return this.entries
      .filter((entry) => (eventType ? entry.eventType === eventType : true))
      .map((entry) => ({ ...entry, data: { ...entry.data } }));
  }
}
