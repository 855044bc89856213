/**
 * Maps a source type ("jira", "linear") to a factory that builds a
 * TrackerSource from settings. Built once and passed to whoever needs it.
 */

import type { SourceSettings } from "../config.js";
import type { ConnectorDeps } from "./core/index.js";
import { ConfigurationError } from "./core/index.js";
import { createJiraSource, JiraSource } from "./jira/index.js";
import { createLinearSource, LinearSource } from "./linear/index.js";
import type { TrackerSource } from "./types.js";

export type SourceFactory = (
  settings: SourceSettings,
  deps: ConnectorDeps,
) => TrackerSource;

export class SourceRegistry {
  private readonly factories: ReadonlyMap<string, SourceFactory>;

  constructor(factories: ReadonlyMap<string, SourceFactory>) {
    this.factories = factories;
  }

  get types(): string[] {
    return [...this.factories.keys()];
  }

  has(sourceType: string): boolean {
    return this.factories.has(sourceType);
  }

  create(
    sourceType: string,
    settings: SourceSettings,
    deps: ConnectorDeps,
  ): TrackerSource {
    const factory = this.factories.get(sourceType);
    if (!factory) {
      throw new ConfigurationError(
        `Unknown source type "${sourceType}". Available: ${this.types.join(", ")}`,
      );
    }
    return factory(settings, deps);
  }
}

// ─── Built-in factories ───

function jiraFactory(settings: SourceSettings, deps: ConnectorDeps): TrackerSource {
  const { server, apiToken, labels, severityField, slaField } = settings.jira;
  if (!server || !apiToken) {
    throw new ConfigurationError(
      "Jira source requires JIRA_SERVER and JIRA_API_TOKEN",
    );
  }
  return createJiraSource(
    { server, apiToken, labels, severityField, slaField },
    deps,
  );
}

function linearFactory(settings: SourceSettings, deps: ConnectorDeps): TrackerSource {
  const { apiKey, labels } = settings.linear;
  if (!apiKey) {
    throw new ConfigurationError("Linear source requires LINEAR_API_KEY");
  }
  return createLinearSource({ apiKey, labels }, deps);
}

export function createDefaultSourceRegistry(): SourceRegistry {
  return new SourceRegistry(
    new Map<string, SourceFactory>([
      [JiraSource.SOURCE_TYPE, jiraFactory],
      [LinearSource.SOURCE_TYPE, linearFactory],
    ]),
  );
}
