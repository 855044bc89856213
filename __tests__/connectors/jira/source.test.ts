import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  SourceError,
} from "../../../src/connectors/core/errors.js";
import {
  buildJql,
  formatJqlDate,
  JiraSource,
} from "../../../src/connectors/jira/source.js";
import type {
  JiraApi,
  JiraIssue,
  JiraProject,
  JiraSearchRequest,
  JiraSearchResponse,
  JiraUser,
} from "../../../src/connectors/jira/types.js";
import type { NormalizedRecord } from "../../../src/connectors/types.js";
import { silentLogger } from "../../helpers.js";

class FakeJiraApi implements JiraApi {
  readonly requests: JiraSearchRequest[] = [];
  private readonly pages: JiraIssue[][];
  private readonly failAt: number | undefined;
  user: JiraUser | Error = { name: "tester", displayName: "Test User" };

  constructor(pages: JiraIssue[][], failAt?: number) {
    this.pages = pages;
    this.failAt = failAt;
  }

  async myself(): Promise<JiraUser> {
    if (this.user instanceof Error) throw this.user;
    return this.user;
  }

  async searchIssues(request: JiraSearchRequest): Promise<JiraSearchResponse> {
    const index = this.requests.length;
    this.requests.push(request);
    if (index === this.failAt) throw new Error("socket hang up");
    return { startAt: request.startAt, issues: this.pages[index] ?? [] };
  }

  async listProjects(): Promise<JiraProject[]> {
    return [
      { id: "1", key: "ACME", name: "Acme" },
      { key: "BETA", name: "Beta" },
    ];
  }
}

function issues(...keys: string[]): JiraIssue[] {
  return keys.map((key) => ({
    key,
    fields: { summary: `CVE-2024-0001 ${key}`, project: { key: "ACME" } },
  }));
}

function makeSource(api: JiraApi, pageSize = 2): JiraSource {
  return new JiraSource(
    api,
    {
      labels: ["Security"],
      severityField: "customfield_1",
      slaField: "customfield_2",
      pageSize,
    },
    silentLogger(),
  );
}

async function collect(iter: AsyncIterable<NormalizedRecord>): Promise<string[]> {
  const keys: string[] = [];
  for await (const rec of iter) keys.push(rec.sourceKey);
  return keys;
}

describe("JiraSource.fetchTrackers", () => {
  it("pages by offset until a short page", async () => {
    const api = new FakeJiraApi([issues("ACME-1", "ACME-2"), issues("ACME-3")]);
    const keys = await collect(makeSource(api).fetchTrackers(["ACME"], null));

    expect(keys).toEqual(["ACME-1", "ACME-2", "ACME-3"]);
    expect(api.requests.map((r) => r.startAt)).toEqual([0, 2]);
    expect(api.requests[0]?.maxResults).toBe(2);
  });

  it("stops on an empty page after full pages", async () => {
    const api = new FakeJiraApi([issues("ACME-1", "ACME-2"), []]);
    const keys = await collect(makeSource(api).fetchTrackers(["ACME"], null));

    expect(keys).toEqual(["ACME-1", "ACME-2"]);
    expect(api.requests).toHaveLength(2);
  });

  it("requests the configured custom fields", async () => {
    const api = new FakeJiraApi([[]]);
    await collect(makeSource(api).fetchTrackers(["ACME"], null));

    expect(api.requests[0]?.fields).toContain("customfield_1");
    expect(api.requests[0]?.fields).toContain("customfield_2");
    expect(api.requests[0]?.fields).toContain("summary");
  });

  it("scopes the query to projects, watermark and labels", async () => {
    const api = new FakeJiraApi([[]]);
    await collect(
      makeSource(api).fetchTrackers(["ACME"], new Date("2024-01-05T08:30:00Z")),
    );

    expect(api.requests[0]?.jql).toBe(
      'project IN ("ACME") AND updated >= "2024-01-05 08:30" AND labels in ("Security")',
    );
  });

  it("throws at call time for an empty project list", () => {
    const api = new FakeJiraApi([]);
    expect(() => makeSource(api).fetchTrackers([], null)).toThrow(
      ConfigurationError,
    );
    expect(api.requests).toHaveLength(0);
  });

  it("fails the iteration when a later page fails", async () => {
    const api = new FakeJiraApi([issues("ACME-1", "ACME-2")], 1);
    const seen: string[] = [];

    const run = async () => {
      for await (const rec of makeSource(api).fetchTrackers(["ACME"], null)) {
        seen.push(rec.sourceKey);
      }
    };

    const error = await run().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SourceError);
    expect(error).toHaveProperty("message", "Jira search failed: socket hang up");
    expect(seen).toEqual(["ACME-1", "ACME-2"]);
  });
});

describe("JiraSource.testConnection", () => {
  it("reports the display name", async () => {
    const result = await makeSource(new FakeJiraApi([])).testConnection();
    expect(result).toEqual({ ok: true, message: "Connected as Test User" });
  });

  it("reports failures without throwing", async () => {
    const api = new FakeJiraApi([]);
    api.user = new SourceError("Jira request to /rest/api/2/myself returned HTTP 401", {
      status: 401,
    });
    const result = await makeSource(api).testConnection();
    expect(result).toEqual({
      ok: false,
      message: "Connection failed: Jira request to /rest/api/2/myself returned HTTP 401",
    });
  });
});

describe("JiraSource.fetchProjects", () => {
  it("lists key and name", async () => {
    const projects = await makeSource(new FakeJiraApi([])).fetchProjects();
    expect(projects).toEqual([
      { key: "ACME", name: "Acme" },
      { key: "BETA", name: "Beta" },
    ]);
  });
});

describe("buildJql", () => {
  it("joins every clause", () => {
    expect(
      buildJql(
        ["ACME", "BETA"],
        new Date("2024-01-05T08:30:00Z"),
        ["Security", "SecurityTracking"],
      ),
    ).toBe(
      'project IN ("ACME", "BETA") AND updated >= "2024-01-05 08:30" AND labels in ("Security", "SecurityTracking")',
    );
  });

  it("omits the date clause without a watermark and escapes quotes", () => {
    expect(buildJql(['AC"ME'], null, [])).toBe('project IN ("AC\\"ME")');
  });
});

describe("formatJqlDate", () => {
  it("renders UTC minutes", () => {
    expect(formatJqlDate(new Date("2024-12-31T23:59:59.999Z"))).toBe(
      "2024-12-31 23:59",
    );
  });
});
