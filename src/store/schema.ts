/** Versioned schema migrations, applied in order against PRAGMA user_version. */

export interface Migration {
  version: number;
  description: string;
  up: string;
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: "initial schema",
    up: `
      CREATE TABLE teams (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        description TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE projects (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        key TEXT NOT NULL UNIQUE,
        name TEXT NOT NULL,
        team_id INTEGER REFERENCES teams(id) ON DELETE SET NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX idx_projects_team ON projects(team_id);

      CREATE TABLE project_dependencies (
        upstream_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
        downstream_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
        PRIMARY KEY (upstream_id, downstream_id)
      );
      CREATE INDEX idx_project_dependencies_downstream
        ON project_dependencies(downstream_id);

      CREATE TABLE cves (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        cve_id TEXT NOT NULL UNIQUE,
        url TEXT,
        description TEXT,
        severity TEXT,
        cvss_score REAL,
        is_embargoed INTEGER NOT NULL DEFAULT 0,
        published_date TEXT,
        embargo_end_date TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE trackers (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        source_type TEXT NOT NULL,
        external_key TEXT NOT NULL,
        project_id INTEGER NOT NULL REFERENCES projects(id),
        cve_id INTEGER REFERENCES cves(id),
        summary TEXT,
        status TEXT,
        resolution TEXT,
        priority TEXT,
        severity TEXT,
        assignee TEXT,
        reporter TEXT,
        created_date TEXT,
        updated_date TEXT,
        resolved_date TEXT,
        due_date TEXT,
        sla_date TEXT,
        sla_breach INTEGER NOT NULL DEFAULT 0,
        last_synced_at TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE (source_type, external_key)
      );
      CREATE INDEX idx_trackers_project ON trackers(project_id);
      CREATE INDEX idx_trackers_cve ON trackers(cve_id);
      CREATE INDEX idx_trackers_created ON trackers(created_date);

      CREATE TABLE tracker_cves (
        tracker_id INTEGER NOT NULL REFERENCES trackers(id) ON DELETE CASCADE,
        cve_id INTEGER NOT NULL REFERENCES cves(id) ON DELETE CASCADE,
        PRIMARY KEY (tracker_id, cve_id)
      );
      CREATE INDEX idx_tracker_cves_cve ON tracker_cves(cve_id);

      CREATE TABLE util (
        key TEXT PRIMARY KEY,
        value TEXT,
        updated_at TEXT NOT NULL
      );
    `,
  },
];

export const SCHEMA_VERSION = MIGRATIONS.reduce(
  (max, m) => Math.max(max, m.version),
  0,
);
