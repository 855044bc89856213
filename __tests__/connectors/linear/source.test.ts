import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  SourceError,
} from "../../../src/connectors/core/errors.js";
import {
  buildIssueFilter,
  LinearSource,
  toNormalizedRecord,
} from "../../../src/connectors/linear/source.js";
import type {
  IssueFilter,
  IssueNode,
  LinearApi,
  PaginatedResponse,
  TeamNode,
  ViewerNode,
} from "../../../src/connectors/linear/types.js";
import { silentLogger } from "../../helpers.js";

function issueNode(overrides: Partial<IssueNode> = {}): IssueNode {
  return {
    identifier: "SEC-12",
    title: "CVE-2024-3333 openssl: buffer over-read",
    priority: 2,
    dueDate: null,
    createdAt: "2024-01-10T10:00:00.000Z",
    updatedAt: "2024-01-11T10:00:00.000Z",
    completedAt: null,
    canceledAt: null,
    slaBreachesAt: null,
    state: { name: "In Progress", type: "started" },
    assignee: { displayName: "Dana Dev" },
    creator: { displayName: "Sam Sec" },
    team: { key: "SEC" },
    labels: { nodes: [{ name: "Security" }] },
    ...overrides,
  };
}

interface PageCall {
  filter: IssueFilter;
  first: number;
  after: string | null;
}

class FakeLinearApi implements LinearApi {
  readonly calls: PageCall[] = [];
  private readonly pages: PaginatedResponse<IssueNode>[];
  private readonly failAt: number | undefined;
  viewerResult: ViewerNode | Error = {
    id: "u1",
    name: "Test User",
    email: "test@example.com",
  };

  constructor(pages: PaginatedResponse<IssueNode>[] = [], failAt?: number) {
    this.pages = pages;
    this.failAt = failAt;
  }

  async viewer(): Promise<ViewerNode> {
    if (this.viewerResult instanceof Error) throw this.viewerResult;
    return this.viewerResult;
  }

  async issuePage(
    filter: IssueFilter,
    first: number,
    after: string | null,
  ): Promise<PaginatedResponse<IssueNode>> {
    const index = this.calls.length;
    this.calls.push({ filter, first, after });
    if (index === this.failAt) throw new Error("socket hang up");
    return (
      this.pages[index] ?? { nodes: [], pageInfo: { hasNextPage: false, endCursor: null } }
    );
  }

  async teams(): Promise<TeamNode[]> {
    return [{ id: "t1", key: "SEC", name: "Security Eng" }];
  }
}

describe("LinearSource.fetchTrackers", () => {
  it("follows cursors until there is no next page", async () => {
    const api = new FakeLinearApi([
      {
        nodes: [issueNode({ identifier: "SEC-1" }), issueNode({ identifier: "SEC-2" })],
        pageInfo: { hasNextPage: true, endCursor: "c1" },
      },
      {
        nodes: [issueNode({ identifier: "SEC-3" })],
        pageInfo: { hasNextPage: false, endCursor: "c2" },
      },
    ]);
    const source = new LinearSource(api, { labels: ["Security"], pageSize: 2 }, silentLogger());

    const keys: string[] = [];
    for await (const rec of source.fetchTrackers(["SEC"], null)) {
      keys.push(rec.sourceKey);
    }

    expect(keys).toEqual(["SEC-1", "SEC-2", "SEC-3"]);
    expect(api.calls.map((c) => c.after)).toEqual([null, "c1"]);
    expect(api.calls[0]?.first).toBe(2);
  });

  it("fails the iteration when a later page fails", async () => {
    const api = new FakeLinearApi(
      [
        {
          nodes: [issueNode({ identifier: "SEC-1" })],
          pageInfo: { hasNextPage: true, endCursor: "c1" },
        },
      ],
      1,
    );
    const source = new LinearSource(api, { labels: [] }, silentLogger());
    const seen: string[] = [];

    const run = async () => {
      for await (const rec of source.fetchTrackers(["SEC"], null)) {
        seen.push(rec.sourceKey);
      }
    };

    const error = await run().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SourceError);
    expect(error).toHaveProperty("message", "Linear issue fetch failed: socket hang up");
    expect(seen).toEqual(["SEC-1"]);
  });

  it("passes source errors through unchanged", async () => {
    const api = new FakeLinearApi();
    const failure = new SourceError("Malformed Linear response: labels: Required");
    api.issuePage = async () => {
      throw failure;
    };
    const source = new LinearSource(api, { labels: [] }, silentLogger());

    const error = await (async () => {
      for await (const _rec of source.fetchTrackers(["SEC"], null)) {
        // drain
      }
    })().catch((err: unknown) => err);

    expect(error).toBe(failure);
  });

  it("throws at call time for an empty team list", () => {
    const source = new LinearSource(new FakeLinearApi(), { labels: [] }, silentLogger());
    expect(() => source.fetchTrackers([], null)).toThrow(ConfigurationError);
  });
});

describe("LinearSource.testConnection", () => {
  it("reports the viewer name", async () => {
    const source = new LinearSource(new FakeLinearApi(), { labels: [] }, silentLogger());
    await expect(source.testConnection()).resolves.toEqual({
      ok: true,
      message: "Connected as Test User",
    });
  });

  it("reports failures", async () => {
    const api = new FakeLinearApi();
    api.viewerResult = new Error("Authentication required");
    const source = new LinearSource(api, { labels: [] }, silentLogger());
    await expect(source.testConnection()).resolves.toEqual({
      ok: false,
      message: "Connection failed: Authentication required",
    });
  });
});

describe("LinearSource.fetchProjects", () => {
  it("maps teams to projects", async () => {
    const source = new LinearSource(new FakeLinearApi(), { labels: [] }, silentLogger());
    await expect(source.fetchProjects()).resolves.toEqual([
      { key: "SEC", name: "Security Eng" },
    ]);
  });
});

describe("buildIssueFilter", () => {
  it("includes every clause", () => {
    expect(
      buildIssueFilter(["SEC", "OPS"], new Date("2024-01-05T08:30:00Z"), ["Security"]),
    ).toEqual({
      team: { key: { in: ["SEC", "OPS"] } },
      updatedAt: { gte: "2024-01-05T08:30:00.000Z" },
      labels: { some: { name: { in: ["Security"] } } },
    });
  });

  it("leaves out the date and labels when absent", () => {
    expect(buildIssueFilter(["SEC"], null, [])).toEqual({
      team: { key: { in: ["SEC"] } },
    });
  });
});

describe("toNormalizedRecord", () => {
  it("maps an open issue", () => {
    const rec = toNormalizedRecord(
      issueNode({
        labels: { nodes: [{ name: "Security" }, { name: "Severity: Critical" }] },
        dueDate: "2024-03-01",
      }),
    );

    expect(rec).toEqual({
      sourceKey: "SEC-12",
      sourceType: "linear",
      projectKey: "SEC",
      summary: "CVE-2024-3333 openssl: buffer over-read",
      status: "In Progress",
      resolution: null,
      priority: "High",
      severity: "Critical",
      assignee: "Dana Dev",
      reporter: "Sam Sec",
      createdDate: new Date("2024-01-10T10:00:00.000Z"),
      updatedDate: new Date("2024-01-11T10:00:00.000Z"),
      resolvedDate: null,
      dueDate: new Date("2024-03-01T00:00:00.000Z"),
      slaDate: null,
      cveIds: ["CVE-2024-3333"],
      labels: ["Security", "Severity: Critical"],
      customFields: {},
    });
  });

  it("derives resolution from completion and cancellation", () => {
    const done = toNormalizedRecord(
      issueNode({ completedAt: "2024-02-01T00:00:00.000Z" }),
    );
    expect(done.resolution).toBe("Done");
    expect(done.resolvedDate).toEqual(new Date("2024-02-01T00:00:00.000Z"));

    const cancelled = toNormalizedRecord(
      issueNode({ canceledAt: "2024-02-02T00:00:00.000Z" }),
    );
    expect(cancelled.resolution).toBe("Cancelled");
    expect(cancelled.resolvedDate).toEqual(new Date("2024-02-02T00:00:00.000Z"));
  });

  it("keeps the SLA breach time", () => {
    const rec = toNormalizedRecord(
      issueNode({ slaBreachesAt: "2024-02-10T00:00:00.000Z", state: null, assignee: null }),
    );
    expect(rec.slaDate).toEqual(new Date("2024-02-10T00:00:00.000Z"));
    expect(rec.customFields).toEqual({ slaBreachesAt: "2024-02-10T00:00:00.000Z" });
    expect(rec.status).toBeNull();
    expect(rec.assignee).toBeNull();
  });

  it("maps unknown priorities to null", () => {
    expect(toNormalizedRecord(issueNode({ priority: 9 })).priority).toBeNull();
    expect(toNormalizedRecord(issueNode({ priority: 0 })).priority).toBe("None");
  });
});
