import type { Logger } from "../src/connectors/core/index.js";
import {
  ConfigurationError,
  createLogger,
  SourceError,
} from "../src/connectors/core/index.js";
import type {
  ConnectionStatus,
  NormalizedRecord,
  SourceProject,
  TrackerSource,
} from "../src/connectors/types.js";
import type { TrackerInput } from "../src/store/index.js";

export function silentLogger(): Logger {
  return createLogger("test", "silent");
}

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  msg: string;
  data?: Record<string, unknown>;
}

/** Logger that keeps every entry, children included, in `entries`. */
export function recordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger: Logger & { entries: LogEntry[] } = {
    entries,
    debug: (msg, data) => entries.push({ level: "debug", msg, data }),
    info: (msg, data) => entries.push({ level: "info", msg, data }),
    warn: (msg, data) => entries.push({ level: "warn", msg, data }),
    error: (msg, data) => entries.push({ level: "error", msg, data }),
    child: () => logger,
  };
  return logger;
}

export function record(overrides: Partial<NormalizedRecord> = {}): NormalizedRecord {
  return {
    sourceKey: "ACME-1",
    sourceType: "jira",
    projectKey: "ACME",
    summary: "CVE-2024-0001 acme: heap overflow",
    status: "New",
    resolution: null,
    priority: "Major",
    severity: "Important",
    assignee: "Dana Dev",
    reporter: "Sam Sec",
    createdDate: new Date("2024-01-10T10:00:00.000Z"),
    updatedDate: new Date("2024-01-12T10:00:00.000Z"),
    resolvedDate: null,
    dueDate: null,
    slaDate: null,
    cveIds: ["CVE-2024-0001"],
    labels: ["Security"],
    customFields: {},
    ...overrides,
  };
}

export interface FakeSourceOptions {
  /** Zero-based page index whose fetch fails with a SourceError. */
  failOnPage?: number;
  connection?: ConnectionStatus;
}

/** In-process TrackerSource that yields fixed pages of records. */
export class FakeSource implements TrackerSource {
  readonly sourceType = "jira";
  readonly displayName = "Fake";
  readonly calls: { projectKeys: string[]; since: Date | null }[] = [];

  private readonly pages: NormalizedRecord[][];
  private readonly opts: FakeSourceOptions;

  constructor(pages: NormalizedRecord[][], opts: FakeSourceOptions = {}) {
    this.pages = pages;
    this.opts = opts;
  }

  async testConnection(): Promise<ConnectionStatus> {
    return this.opts.connection ?? { ok: true, message: "Connected as tester" };
  }

  fetchTrackers(
    projectKeys: string[],
    since: Date | null,
  ): AsyncIterable<NormalizedRecord> {
    if (projectKeys.length === 0) {
      throw new ConfigurationError("project keys are required");
    }
    this.calls.push({ projectKeys, since });
    return this.iterate();
  }

  async fetchProjects(): Promise<SourceProject[]> {
    return [{ key: "ACME", name: "Acme" }];
  }

  private async *iterate(): AsyncGenerator<NormalizedRecord> {
    for (const [index, page] of this.pages.entries()) {
      if (index === this.opts.failOnPage) {
        throw new SourceError("connection reset by peer");
      }
      yield* page;
    }
  }
}

export function trackerInput(
  projectId: number,
  overrides: Partial<TrackerInput> = {},
): TrackerInput {
  return {
    sourceType: "jira",
    externalKey: "ACME-1",
    projectId,
    cveId: null,
    summary: "CVE-2024-0001 acme: heap overflow",
    status: "New",
    resolution: null,
    priority: "Major",
    severity: "Important",
    assignee: null,
    reporter: null,
    createdDate: new Date("2024-01-10T10:00:00.000Z"),
    updatedDate: new Date("2024-01-12T10:00:00.000Z"),
    resolvedDate: null,
    dueDate: null,
    slaDate: null,
    slaBreach: false,
    lastSyncedAt: new Date("2024-02-01T00:00:00.000Z"),
    ...overrides,
  };
}
