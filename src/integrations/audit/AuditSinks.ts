import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { AuditEntry, AuditSink } from '../../core/types';

/** Bounded in-process audit trail; the default sink when no endpoint is configured. */
export class InMemoryAuditSink implements AuditSink {
  private entries: AuditEntry[] = [];

  constructor(private readonly maxEntries: number = 10000) {}

  async record(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(kind?: AuditEntry['kind']): AuditEntry[] {
    return kind ? this.entries.filter((e) => e.kind === kind) : [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

export interface HttpAuditSinkConfig {
  endpoint: string;
  apiKey?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

/** Forwards audit entries to the compliance service as JSON. */
export class HttpAuditSink implements AuditSink {
  private client: AxiosInstance;

  constructor(config: HttpAuditSinkConfig) {
    this.client = axios.create({
      baseURL: config.endpoint,
      timeout: config.timeoutMs ?? 10000,
      adapter: config.adapter,
      headers: {
        'Content-Type': 'application/json',
        ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
      },
    });
  }

  async record(entry: AuditEntry): Promise<void> {
    await this.client.post('/audit-entries', entry);
  }
}
