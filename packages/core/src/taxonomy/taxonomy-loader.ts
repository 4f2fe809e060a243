/**
 * Taxonomy loaders
 *
 * The bundled JSON is checked for structure once, here: field types, score
 * ranges and hex colors. Label values (spirit, flavor, complexity) are left
 * as strings; cocktailToProfile() is the single place that interprets them.
 */

import { z } from "zod";

import type {
  AestheticAtlas,
  AtlasEntry,
  CocktailFamily,
  FamilyCharacteristics,
  TaxonomyEntry
} from "../types.js";
import { COCKTAIL_FAMILIES } from "../labels.js";
import { TaxonomyFormatError } from "../errors.js";

import cocktailsJson from "../../taxonomy/cocktails.json" with { type: "json" };
import atlasJson from "../../taxonomy/atlas.json" with { type: "json" };

// ========================================
// Schemas
// ========================================

const score = z.number().int().min(0).max(10);
const hexColor = z.string().regex(/^#[0-9A-Fa-f]{6}$/, "expected a #RRGGBB color");
const canonicalId = z.string().regex(/^[a-z0-9_]+$/, "expected a lowercase snake_case id");

const rawCocktailSchema = z.object({
  id: canonicalId,
  name: z.string().min(1),
  spiritBase: z.string().min(1),
  primaryFlavor: z.string().min(1),
  complexity: z.string().optional(),
  bitterness: score.optional(),
  sweetness: score.optional(),
  richness: score.optional(),
  colorPalette: z.array(hexColor).optional(),
  hasCream: z.boolean().optional(),
  hasIce: z.boolean().optional(),
  isEffervescent: z.boolean().optional(),
  description: z.string().optional()
});

const cocktailTaxonomySchema = z.object({
  version: z.literal(1),
  cocktails: z.array(rawCocktailSchema)
});

const familySchema = z.enum(COCKTAIL_FAMILIES);

const atlasEntrySchema = z.object({
  id: canonicalId,
  family: familySchema,
  baseSpirit: z.string().min(1),
  colorPalette: z.array(hexColor).min(1),
  colorDescription: z.string(),
  lighting: z.string(),
  mood: z.string(),
  composition: z.string(),
  texture: z.string(),
  culturalContext: z.string(),
  temporalAssociation: z.string(),
  technique: z.string()
});

const familyCharacteristicsSchema = z.object({
  id: familySchema,
  description: z.string(),
  lighting: z.string(),
  mood: z.string(),
  composition: z.string()
});

const atlasSchema = z.object({
  version: z.literal(1),
  cocktails: z.array(atlasEntrySchema),
  families: z.array(familyCharacteristicsSchema)
});

// ========================================
// Helpers
// ========================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

function assertUniqueIds(source: string, ids: string[]): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const id of ids) {
    if (seen.has(id)) duplicates.push(id);
    seen.add(id);
  }
  if (duplicates.length > 0) {
    throw new TaxonomyFormatError(
      source,
      duplicates.map((id) => `duplicate id: ${id}`)
    );
  }
}

// ========================================
// Profile taxonomy
// ========================================

/**
 * Validates profile-taxonomy data and returns its entries in authoring order.
 *
 * @throws TaxonomyFormatError when the structure is wrong or ids repeat
 */
export function parseCocktailTaxonomy(data: unknown, source = "cocktails.json"): TaxonomyEntry[] {
  const parsed = cocktailTaxonomySchema.safeParse(data);
  if (!parsed.success) {
    throw new TaxonomyFormatError(source, formatIssues(parsed.error));
  }

  const entries = parsed.data.cocktails.map(({ id, ...record }) => ({ id, record }));
  assertUniqueIds(source, entries.map((entry) => entry.id));
  return entries;
}

/** Bundled profile taxonomy */
export function loadCocktailTaxonomy(): TaxonomyEntry[] {
  return parseCocktailTaxonomy(cocktailsJson);
}

// ========================================
// Aesthetic atlas
// ========================================

/**
 * Validates atlas data and indexes it by cocktail id and family.
 *
 * @throws TaxonomyFormatError when the structure is wrong or ids repeat
 */
export function parseAestheticAtlas(data: unknown, source = "atlas.json"): AestheticAtlas {
  const parsed = atlasSchema.safeParse(data);
  if (!parsed.success) {
    throw new TaxonomyFormatError(source, formatIssues(parsed.error));
  }

  assertUniqueIds(source, parsed.data.cocktails.map((entry) => entry.id));
  assertUniqueIds(source, parsed.data.families.map((family) => family.id));

  const cocktails = new Map<string, AtlasEntry>();
  for (const { id, ...entry } of parsed.data.cocktails) {
    cocktails.set(id, entry);
  }

  const families = new Map<CocktailFamily, FamilyCharacteristics>();
  for (const { id, ...characteristics } of parsed.data.families) {
    families.set(id, characteristics);
  }

  return { cocktails, families };
}

let bundledAtlas: AestheticAtlas | null = null;

/** Bundled atlas, parsed on first use */
export function loadAestheticAtlas(): AestheticAtlas {
  if (!bundledAtlas) {
    bundledAtlas = parseAestheticAtlas(atlasJson);
  }
  return bundledAtlas;
}
