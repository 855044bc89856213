import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ConfigurationError,
  SourceError,
} from "../../src/connectors/core/errors.js";
import type { NormalizedRecord } from "../../src/connectors/types.js";
import { EntityStore, isOpen } from "../../src/store/index.js";
import { ReconciliationEngine } from "../../src/sync/engine.js";
import { FakeSource, record, silentLogger } from "../helpers.js";

const NOW = new Date("2024-02-01T00:00:00.000Z");

describe("ReconciliationEngine", () => {
  let store: EntityStore;
  let engine: ReconciliationEngine;

  beforeEach(() => {
    store = EntityStore.inMemory();
    engine = new ReconciliationEngine(store, {
      logger: silentLogger(),
      clock: () => NOW,
    });
  });

  afterEach(() => {
    store.close();
  });

  const twoCves = record({
    summary: "CVE-2024-0001 CVE-2024-0002 acme: heap overflow",
    cveIds: ["CVE-2024-0001", "CVE-2024-0002"],
  });

  it("creates the project, every CVE and the tracker", async () => {
    const stats = await engine.sync(new FakeSource([[twoCves]]), ["ACME"], null);

    expect(stats).toEqual({
      trackersCreated: 1,
      trackersUpdated: 0,
      cvesCreated: 2,
      projectsCreated: 1,
      errors: [],
    });

    const tracker = store.trackers.findByKey("jira", "ACME-1");
    expect(tracker?.projectId).toBe(store.projects.findByKey("ACME")?.id);
    expect(tracker?.cveId).toBe(store.cves.findByCveId("CVE-2024-0002")?.id);
    expect(tracker?.lastSyncedAt).toEqual(NOW);
    expect(tracker && store.trackers.cvesOf(tracker.id)).toEqual([
      "CVE-2024-0001",
      "CVE-2024-0002",
    ]);
  });

  it("updates a known tracker in place", async () => {
    await engine.sync(new FakeSource([[twoCves]]), ["ACME"], null);
    const closed = record({
      ...twoCves,
      status: "Closed",
      resolution: "Done",
      resolvedDate: new Date("2024-01-20T00:00:00.000Z"),
    });

    const stats = await engine.sync(new FakeSource([[closed]]), ["ACME"], null);

    expect(stats).toEqual({
      trackersCreated: 0,
      trackersUpdated: 1,
      cvesCreated: 0,
      projectsCreated: 0,
      errors: [],
    });
    const tracker = store.trackers.findByKey("jira", "ACME-1");
    expect(tracker?.status).toBe("Closed");
    expect(tracker && isOpen(tracker)).toBe(false);
    expect(store.trackers.count()).toBe(1);
  });

  it("leaves the store unchanged when replaying the same records", async () => {
    const pages = [[twoCves, record({ sourceKey: "ACME-2" })]];
    await engine.sync(new FakeSource(pages), ["ACME"], null);
    const before = {
      trackers: store.trackers.count(),
      cves: store.cves.list().length,
      projects: store.projects.list().length,
    };

    const stats = await engine.sync(new FakeSource(pages), ["ACME"], null);

    expect(stats.trackersCreated).toBe(0);
    expect(stats.trackersUpdated).toBe(2);
    expect({
      trackers: store.trackers.count(),
      cves: store.cves.list().length,
      projects: store.projects.list().length,
    }).toEqual(before);
  });

  it("refuses an empty project scope before touching the source", async () => {
    const source = new FakeSource([[record()]]);

    await expect(engine.sync(source, [], null)).rejects.toThrow(ConfigurationError);
    expect(source.calls).toEqual([]);
    expect(store.trackers.count()).toBe(0);
  });

  it("passes the scope and watermark to the source", async () => {
    const source = new FakeSource([]);
    const since = new Date("2024-01-05T00:00:00.000Z");
    await engine.sync(source, ["ACME", "BETA"], since);
    expect(source.calls).toEqual([{ projectKeys: ["ACME", "BETA"], since }]);
  });

  it("rolls back a failing record and keeps going", async () => {
    const bad = record({
      sourceKey: "ACME-2",
      projectKey: "NEWPROJ",
      cveIds: ["CVE-2024-0009"],
      createdDate: new Date("not a date"),
    });
    const good = record({ sourceKey: "ACME-3" });

    const stats = await engine.sync(
      new FakeSource([[record(), bad, good]]),
      ["ACME"],
      null,
    );

    expect(stats.errors).toEqual(["ACME-2: Invalid time value"]);
    expect(stats.trackersCreated).toBe(2);
    expect(stats.projectsCreated).toBe(1);
    expect(stats.cvesCreated).toBe(1);
    expect(store.projects.findByKey("NEWPROJ")).toBeNull();
    expect(store.cves.findByCveId("CVE-2024-0009")).toBeNull();
    expect(store.trackers.findByKey("jira", "ACME-3")).not.toBeNull();
  });

  it("reports a record without a project key", async () => {
    const stats = await engine.sync(
      new FakeSource([[record({ projectKey: "" })]]),
      ["ACME"],
      null,
    );
    expect(stats.errors).toEqual(["ACME-1: record has no project key"]);
    expect(store.trackers.count()).toBe(0);
  });

  it("commits nothing when a later page fails", async () => {
    const firstPage: NormalizedRecord[] = Array.from({ length: 100 }, (_, i) =>
      record({ sourceKey: `ACME-${i + 1}` }),
    );
    const source = new FakeSource([firstPage, []], { failOnPage: 1 });

    await expect(engine.sync(source, ["ACME"], null)).rejects.toThrow(
      "connection reset by peer",
    );
    expect(store.inTransaction).toBe(false);
    expect(store.trackers.count()).toBe(0);
    expect(store.projects.list()).toEqual([]);
  });

  it("stops and rolls back when aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      engine.sync(new FakeSource([[record()]]), ["ACME"], null, {
        signal: controller.signal,
      }),
    ).rejects.toThrow(SourceError);
    expect(store.trackers.count()).toBe(0);
  });

  it("refuses a second sync while one is running", async () => {
    const first = engine.sync(new FakeSource([[record()]]), ["ACME"], null);
    const second = engine.sync(new FakeSource([[record()]]), ["ACME"], null);

    await expect(second).rejects.toThrow("a sync is already running on this store");
    await expect(first).resolves.toMatchObject({ trackersCreated: 1 });
  });

  it("flags SLA breaches against the clock", async () => {
    const stats = await engine.sync(
      new FakeSource([
        [
          record({ sourceKey: "ACME-1", slaDate: new Date("2024-01-15T00:00:00.000Z") }),
          record({ sourceKey: "ACME-2", slaDate: new Date("2024-03-01T00:00:00.000Z") }),
          record({
            sourceKey: "ACME-3",
            slaDate: new Date("2024-01-15T00:00:00.000Z"),
            resolvedDate: new Date("2024-01-14T00:00:00.000Z"),
          }),
        ],
      ]),
      ["ACME"],
      null,
    );

    expect(stats.errors).toEqual([]);
    expect(store.trackers.findByKey("jira", "ACME-1")?.slaBreach).toBe(true);
    expect(store.trackers.findByKey("jira", "ACME-2")?.slaBreach).toBe(false);
    expect(store.trackers.findByKey("jira", "ACME-3")?.slaBreach).toBe(false);
  });
});
