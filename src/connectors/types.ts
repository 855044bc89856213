/** Source-agnostic tracker record and the contract every source implements. */

// ─── Normalized Record ───

export interface NormalizedRecord {
  /** Unique key in the source system, e.g. "PROJ-1234". */
  sourceKey: string;
  sourceType: string;
  projectKey: string;
  summary: string | null;
  status: string | null;
  resolution: string | null;
  priority: string | null;
  /** Critical, Important, Moderate, Low; null when the source has none. */
  severity: string | null;
  assignee: string | null;
  reporter: string | null;
  createdDate: Date | null;
  updatedDate: Date | null;
  resolvedDate: Date | null;
  dueDate: Date | null;
  slaDate: Date | null;
  cveIds: string[];
  labels: string[];
  customFields: Record<string, unknown>;
}

// ─── Source Contract ───

export interface ConnectionStatus {
  ok: boolean;
  message: string;
}

export interface SourceProject {
  key: string;
  name: string;
}

export interface TrackerSource {
  readonly sourceType: string;
  readonly displayName: string;

  /** Pre-flight check. Never throws; failures come back with `ok: false`. */
  testConnection(): Promise<ConnectionStatus>;

  /**
   * Lazily fetch trackers for the given projects, optionally only those
   * updated since `since`.
   *
   * Throws ConfigurationError immediately when `projectKeys` is empty.
   * A page failure surfaces as a SourceError from the iterator.
   */
  fetchTrackers(
    projectKeys: string[],
    since: Date | null,
  ): AsyncIterable<NormalizedRecord>;

  /** Projects visible to the source credentials, for discovery. */
  fetchProjects(): Promise<SourceProject[]>;
}
