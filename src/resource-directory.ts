// Support Session Orchestrator - Resource Directory
// Read-only hotline and support-service lookup by locale and category.
// Lookups never touch session state.

import { readFileSync } from "node:fs";
import type { ResourceBundle, ResourceCategory, SupportResource } from "./types.js";
import { normalizeLocale } from "./utils.js";

export interface ResourceDirectory {
  lookup(locale: string, category: ResourceCategory): Promise<ResourceBundle>;
}

export interface LocaleEntry {
  emergencyNumber: string;
  resources: SupportResource[];
}

export type DirectoryData = Record<string, LocaleEntry>;

const CATEGORIES: readonly ResourceCategory[] = [
  "crisis",
  "suicide_prevention",
  "domestic_violence",
  "mental_health",
  "general",
];

/** Categories shown when a locale has nothing in the requested category. */
const FALLBACK_CATEGORIES: readonly ResourceCategory[] = ["crisis", "suicide_prevention"];

const REGION_ALIASES: Readonly<Record<string, string>> = { UK: "GB" };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nullableString(value: unknown, field: string): string | null {
  if (value === null || typeof value === "string") return value;
  throw new Error(`Resource directory: "${field}" must be a string or null`);
}

function requiredString(value: unknown, field: string): string {
  if (typeof value === "string" && value.length > 0) return value;
  throw new Error(`Resource directory: "${field}" must be a non-empty string`);
}

function parseResource(raw: unknown): SupportResource {
  if (!isRecord(raw)) throw new Error("Resource directory: resource entries must be objects");
  const category = CATEGORIES.find((c) => c === raw.category);
  if (!category) throw new Error(`Resource directory: unknown category ${JSON.stringify(raw.category)}`);
  return {
    id: requiredString(raw.id, "id"),
    name: requiredString(raw.name, "name"),
    category,
    phone: nullableString(raw.phone, "phone"),
    text: nullableString(raw.text, "text"),
    website: nullableString(raw.website, "website"),
    hours: requiredString(raw.hours, "hours"),
    description: requiredString(raw.description, "description"),
  };
}

/**
 * Validates a parsed directory document keyed by region code.
 * @throws Error naming the first malformed entry.
 */
export function parseDirectoryData(raw: unknown): DirectoryData {
  if (!isRecord(raw)) throw new Error("Resource directory: document must be an object");
  const data: DirectoryData = {};
  for (const [region, entry] of Object.entries(raw)) {
    if (!isRecord(entry) || !Array.isArray(entry.resources)) {
      throw new Error(`Resource directory: entry for ${region} must have a resources array`);
    }
    data[region.toUpperCase()] = {
      emergencyNumber: requiredString(entry.emergencyNumber, `${region}.emergencyNumber`),
      resources: entry.resources.map(parseResource),
    };
  }
  return data;
}

export function loadDefaultDirectoryData(): DirectoryData {
  const file = new URL("../data/resources.json", import.meta.url);
  return parseDirectoryData(JSON.parse(readFileSync(file, "utf-8")));
}

export class StaticResourceDirectory implements ResourceDirectory {
  private readonly defaultRegion: string;

  constructor(
    private readonly data: DirectoryData = loadDefaultDirectoryData(),
    defaultLocale = "US",
  ) {
    this.defaultRegion = this.resolveRegion(defaultLocale, "US");
    if (!this.data[this.defaultRegion]) {
      throw new Error(`Resource directory has no entry for default locale ${this.defaultRegion}`);
    }
  }

  /**
   * Unknown locales resolve to the default locale. "general" returns every
   * resource for the locale; an empty category falls back to crisis and
   * suicide-prevention lines.
   */
  async lookup(locale: string, category: ResourceCategory): Promise<ResourceBundle> {
    const requested = this.resolveRegion(locale, this.defaultRegion);
    const region = this.data[requested] ? requested : this.defaultRegion;
    const entry = this.data[region];

    let resources =
      category === "general" ? entry.resources : entry.resources.filter((r) => r.category === category);
    if (resources.length === 0) {
      resources = entry.resources.filter((r) => FALLBACK_CATEGORIES.includes(r.category));
    }

    return {
      locale: region,
      category,
      emergencyNumber: entry.emergencyNumber,
      resources: resources.map((r) => ({ ...r })),
    };
  }

  get locales(): string[] {
    return Object.keys(this.data);
  }

  private resolveRegion(locale: string, fallback: string): string {
    const region = normalizeLocale(locale, fallback);
    return REGION_ALIASES[region] ?? region;
  }
}
