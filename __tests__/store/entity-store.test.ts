import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StoreError } from "../../src/connectors/core/errors.js";
import { EntityStore } from "../../src/store/index.js";

describe("EntityStore transactions", () => {
  let store: EntityStore;

  beforeEach(() => {
    store = EntityStore.inMemory();
  });

  afterEach(() => {
    store.close();
  });

  const teamNames = () => store.teams.list().map((t) => t.name);

  it("commits a manual transaction", () => {
    store.begin();
    expect(store.inTransaction).toBe(true);
    store.teams.create("Platform");
    store.commit();

    expect(store.inTransaction).toBe(false);
    expect(teamNames()).toEqual(["Platform"]);
  });

  it("rolls back a manual transaction", () => {
    store.begin();
    store.teams.create("Platform");
    store.rollback();

    expect(teamNames()).toEqual([]);
  });

  it("ignores rollback outside a transaction", () => {
    expect(() => store.rollback()).not.toThrow();
  });

  it("undoes only the work after a savepoint", () => {
    store.begin();
    store.teams.create("Platform");
    store.savepoint("record");
    store.teams.create("Console");
    store.rollbackTo("record");
    store.savepoint("record");
    store.teams.create("Edge");
    store.release("record");
    store.commit();

    expect(teamNames()).toEqual(["Edge", "Platform"]);
  });

  it("rejects unsafe savepoint names", () => {
    const error = (() => {
      try {
        store.savepoint("x; DROP TABLE teams");
        return null;
      } catch (err) {
        return err;
      }
    })();
    expect(error).toBeInstanceOf(StoreError);
    expect(error).toHaveProperty("code", "INVALID_NAME");
  });

  it("rolls back a failed transaction function and wraps the error", () => {
    const error = (() => {
      try {
        store.transaction(() => {
          store.teams.create("Platform");
          store.teams.create("Platform");
        });
        return null;
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toHaveProperty("isConstraintViolation", true);
    expect(error).toHaveProperty(
      "message",
      "transaction: UNIQUE constraint failed: teams.name",
    );
    expect(teamNames()).toEqual([]);
  });

  it("returns the transaction function's value", () => {
    const team = store.transaction(() => store.teams.create("Platform"));
    expect(team.name).toBe("Platform");
  });
});
