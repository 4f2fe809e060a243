/**
 * Profile catalog
 *
 * Holds the derived CocktailProfile for every taxonomy entry, keyed by
 * canonical id. The catalog is created explicitly and handed to each query;
 * nothing is derived until the first lookup, and the table is scanned
 * exactly once for the lifetime of the catalog.
 */

import type { CocktailProfile, TaxonomyEntry } from "../types.js";
import { cocktailToProfile } from "../aesthetic/profile-resolver.js";
import { loadCocktailTaxonomy } from "../taxonomy/taxonomy-loader.js";
import { normalizeCocktailKey } from "./keys.js";

export type TaxonomySource = readonly TaxonomyEntry[] | (() => readonly TaxonomyEntry[]);

/** A taxonomy entry that failed conversion and was left out of the catalog */
export interface SkippedEntry {
  id: string;
  error: Error;
}

export interface ProfileCatalogOptions {
  /**
   * Called once per entry that fails conversion.
   * Defaults to a console warning.
   */
  onSkip?: (skipped: SkippedEntry) => void;
}

/** Freezes a profile along with its nested records and lists */
function freezeProfile(profile: CocktailProfile): CocktailProfile {
  const { flavorProfile, visualParameters } = profile;
  Object.freeze(flavorProfile.secondaryFlavors);
  Object.freeze(flavorProfile);
  Object.freeze(visualParameters.colorPalette);
  Object.freeze(visualParameters.secondaryMoods);
  Object.freeze(visualParameters);
  return Object.freeze(profile);
}

function warnSkipped({ id, error }: SkippedEntry): void {
  console.warn(`[catalog] Skipping cocktail '${id}': ${error.message}`);
}

export class ProfileCatalog {
  private readonly source: TaxonomySource;
  private readonly onSkip: (skipped: SkippedEntry) => void;

  private profiles: ReadonlyMap<string, CocktailProfile> = new Map();
  private skippedEntries: readonly SkippedEntry[] = [];
  private built = false;
  private scans = 0;

  constructor(source: TaxonomySource, options: ProfileCatalogOptions = {}) {
    this.source = source;
    this.onSkip = options.onSkip ?? warnSkipped;
  }

  /**
   * Derives every profile on first call; later calls return immediately.
   * An entry whose labels do not convert is skipped and reported through
   * onSkip, so one bad record never blocks the rest.
   */
  ensureBuilt(): void {
    if (this.built) return;

    // A loader that throws leaves the catalog unbuilt and propagates.
    const entries = typeof this.source === "function" ? this.source() : this.source;
    this.built = true;
    this.scans += 1;

    const profiles = new Map<string, CocktailProfile>();
    const skipped: SkippedEntry[] = [];

    for (const { id, record } of entries) {
      try {
        profiles.set(id, freezeProfile(cocktailToProfile(record)));
      } catch (err) {
        const entry: SkippedEntry = { id, error: err instanceof Error ? err : new Error(String(err)) };
        skipped.push(entry);
        this.onSkip(entry);
      }
    }

    this.profiles = profiles;
    this.skippedEntries = Object.freeze(skipped);
  }

  /** Number of full taxonomy scans performed (0 before first use, then 1) */
  get scanCount(): number {
    return this.scans;
  }

  get size(): number {
    this.ensureBuilt();
    return this.profiles.size;
  }

  get skipped(): readonly SkippedEntry[] {
    this.ensureBuilt();
    return this.skippedEntries;
  }

  /**
   * Looks up a profile by display name or id.
   * The name is normalized with normalizeCocktailKey() first.
   */
  get(name: string): CocktailProfile | undefined {
    this.ensureBuilt();
    return this.profiles.get(normalizeCocktailKey(name));
  }

  /** [id, profile] pairs in taxonomy order */
  entries(): IterableIterator<[string, CocktailProfile]> {
    this.ensureBuilt();
    return this.profiles.entries();
  }
}

let defaultCatalog: ProfileCatalog | null = null;

/**
 * Process-wide catalog over the bundled taxonomy, created on first call.
 */
export function getDefaultCatalog(): ProfileCatalog {
  if (!defaultCatalog) {
    defaultCatalog = new ProfileCatalog(loadCocktailTaxonomy);
  }
  return defaultCatalog;
}
