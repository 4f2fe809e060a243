/**
 * Aesthetic atlas queries
 *
 * The atlas is free text rather than labels: its queries return entries as
 * authored and search by substring. Lookups share the profile catalog's key
 * normalization and, like the profile queries, report a missing cocktail as
 * a value instead of throwing.
 */

import type {
  AestheticAtlas,
  AtlasEntry,
  CocktailFamily,
  FamilyCharacteristics,
  NotFoundResult
} from "../types.js";
import { normalizeCocktailKey } from "../catalog/keys.js";

/** Search terms each color preference expands to */
export const COLOR_SEARCH_TERMS: Readonly<Record<string, readonly string[]>> = {
  red: ["red", "burgundy", "ruby"],
  amber: ["amber", "mahogany", "brown"],
  golden: ["golden", "gold", "yellow"],
  clear: ["clear", "crystalline", "silver", "white"],
  green: ["green", "mint", "chartreuse", "lime"],
  purple: ["purple", "violet", "lavender"],
  orange: ["orange", "sunset"],
  dark: ["dark", "espresso", "black"],
  pale: ["pale", "light"]
};

const FAMILY_EXAMPLE_LIMIT = 5;

const SYNTHESIS_INSTRUCTIONS = {
  approach: "Weave cocktail aesthetics naturally into the base prompt",
  priority: "Color palette and lighting should be primary, mood and composition secondary",
  avoid: "Don't literally mention the cocktail unless contextually appropriate",
  style: "Create vivid, sensory-rich description that captures cocktail essence visually"
} as const;

// ========================================
// Result shapes
// ========================================

export interface AtlasNotFoundResult extends NotFoundResult {
  available_cocktails: string;
  suggestion?: string;
}

export interface AtlasEnhancementResult {
  cocktail_name: string;
  base_prompt: string;
  visual_parameters: {
    color_palette: string[];
    color_description: string;
    lighting_style: string;
    mood_keywords: string;
    composition_guide: string;
    texture_notes: string;
    cultural_context: string;
    temporal_association: string;
    technique_influence: string;
  };
  cocktail_metadata: {
    family: CocktailFamily;
    base_spirit: string;
  };
  synthesis_instructions: typeof SYNTHESIS_INSTRUCTIONS;
}

export interface AtlasListing {
  name: string;
  base_spirit: string;
  color_description: string;
  mood: string;
  era: string;
}

export interface AtlasListResult {
  total_cocktails: number;
  families: CocktailFamily[];
  cocktails_by_family: Partial<Record<CocktailFamily, AtlasListing[]>>;
  usage_tip: string;
}

export interface AtlasProfileView {
  family: CocktailFamily;
  base_spirit: string;
  color_palette: string[];
  color_description: string;
  lighting: string;
  mood: string;
  composition: string;
  texture: string;
  cultural_context: string;
  temporal_association: string;
  technique: string;
}

export interface AtlasDetailsResult {
  cocktail_name: string;
  profile: AtlasProfileView;
  family_characteristics: FamilyCharacteristics | Record<string, never>;
}

export interface MoodSearchResult {
  mood_query: string;
  matches_found: number;
  cocktails: Array<{
    name: string;
    mood: string;
    color_description: string;
    lighting: string;
    cultural_context: string;
  }>;
}

export interface ColorSearchResult {
  color_query: string;
  matches_found: number;
  cocktails: Array<{
    name: string;
    color_description: string;
    color_palette: string[];
    lighting: string;
  }>;
}

export interface FamilyAestheticResult {
  family: string;
  characteristics: FamilyCharacteristics | Record<string, never>;
  example_cocktails: Array<{ name: string; color_description: string; mood: string }>;
  total_in_family: number;
}

// ========================================
// Helpers
// ========================================

function availableCocktails(atlas: AestheticAtlas): string {
  return [...atlas.cocktails.keys()].sort().join(", ");
}

/** Text before the first comma, e.g. the leading mood keyword */
function leadingPhrase(text: string): string {
  return text.split(",")[0];
}

function toProfileView(entry: AtlasEntry): AtlasProfileView {
  return {
    family: entry.family,
    base_spirit: entry.baseSpirit,
    color_palette: [...entry.colorPalette],
    color_description: entry.colorDescription,
    lighting: entry.lighting,
    mood: entry.mood,
    composition: entry.composition,
    texture: entry.texture,
    cultural_context: entry.culturalContext,
    temporal_association: entry.temporalAssociation,
    technique: entry.technique
  };
}

function familyCharacteristicsOf(
  atlas: AestheticAtlas,
  family: string
): FamilyCharacteristics | Record<string, never> {
  for (const [id, characteristics] of atlas.families) {
    if (id === family) return { ...characteristics };
  }
  return {};
}

// ========================================
// Queries
// ========================================

/**
 * Atlas entry for `cocktail` packaged with instructions for merging it into
 * an image prompt. The caller's spelling of the name is echoed back.
 */
export function enhanceWithCocktailAesthetic(
  atlas: AestheticAtlas,
  basePrompt: string,
  cocktail: string
): AtlasEnhancementResult | AtlasNotFoundResult {
  const entry = atlas.cocktails.get(normalizeCocktailKey(cocktail));
  if (!entry) {
    return {
      error: `Cocktail '${cocktail}' not found in taxonomy`,
      available_cocktails: availableCocktails(atlas),
      suggestion: "Try one of the available cocktails or use list_available_cocktails tool"
    };
  }

  return {
    cocktail_name: cocktail,
    base_prompt: basePrompt,
    visual_parameters: {
      color_palette: [...entry.colorPalette],
      color_description: entry.colorDescription,
      lighting_style: entry.lighting,
      mood_keywords: entry.mood,
      composition_guide: entry.composition,
      texture_notes: entry.texture,
      cultural_context: entry.culturalContext,
      temporal_association: entry.temporalAssociation,
      technique_influence: entry.technique
    },
    cocktail_metadata: {
      family: entry.family,
      base_spirit: entry.baseSpirit
    },
    synthesis_instructions: SYNTHESIS_INSTRUCTIONS
  };
}

/** Every atlas cocktail grouped by family, families in first-seen order */
export function listAvailableCocktails(atlas: AestheticAtlas): AtlasListResult {
  const byFamily: Partial<Record<CocktailFamily, AtlasListing[]>> = {};
  const families: CocktailFamily[] = [];

  for (const [name, entry] of atlas.cocktails) {
    let listings = byFamily[entry.family];
    if (!listings) {
      listings = [];
      byFamily[entry.family] = listings;
      families.push(entry.family);
    }
    listings.push({
      name,
      base_spirit: entry.baseSpirit,
      color_description: entry.colorDescription,
      mood: leadingPhrase(entry.mood),
      era: leadingPhrase(entry.culturalContext)
    });
  }

  return {
    total_cocktails: atlas.cocktails.size,
    families,
    cocktails_by_family: byFamily,
    usage_tip: "Use enhance_with_cocktail_aesthetic with any cocktail name from this list"
  };
}

export function getCocktailDetails(
  atlas: AestheticAtlas,
  cocktail: string
): AtlasDetailsResult | AtlasNotFoundResult {
  const entry = atlas.cocktails.get(normalizeCocktailKey(cocktail));
  if (!entry) {
    return {
      error: `Cocktail '${cocktail}' not found`,
      available_cocktails: availableCocktails(atlas)
    };
  }

  return {
    cocktail_name: cocktail,
    profile: toProfileView(entry),
    family_characteristics: familyCharacteristicsOf(atlas, entry.family)
  };
}

/** Cocktails whose mood text contains `mood` (case-insensitive substring) */
export function searchCocktailsByMood(atlas: AestheticAtlas, mood: string): MoodSearchResult {
  const moodLower = mood.toLowerCase();
  const cocktails: MoodSearchResult["cocktails"] = [];

  for (const [name, entry] of atlas.cocktails) {
    if (entry.mood.toLowerCase().includes(moodLower)) {
      cocktails.push({
        name,
        mood: entry.mood,
        color_description: entry.colorDescription,
        lighting: entry.lighting,
        cultural_context: entry.culturalContext
      });
    }
  }

  return { mood_query: mood, matches_found: cocktails.length, cocktails };
}

/**
 * Cocktails whose color description mentions any term the preference expands
 * to. A preference without an expansion is searched for as-is.
 */
export function searchCocktailsByColor(atlas: AestheticAtlas, colorPreference: string): ColorSearchResult {
  const colorLower = colorPreference.toLowerCase();
  const terms = COLOR_SEARCH_TERMS[colorLower] ?? [colorLower];
  const cocktails: ColorSearchResult["cocktails"] = [];

  for (const [name, entry] of atlas.cocktails) {
    const description = entry.colorDescription.toLowerCase();
    if (terms.some((term) => description.includes(term))) {
      cocktails.push({
        name,
        color_description: entry.colorDescription,
        color_palette: [...entry.colorPalette],
        lighting: entry.lighting
      });
    }
  }

  return { color_query: colorPreference, matches_found: cocktails.length, cocktails };
}

/**
 * Shared characteristics of a family plus up to five of its cocktails.
 * Families without a characteristics entry report an empty object.
 */
export function getCocktailFamilyAesthetic(atlas: AestheticAtlas, family: string): FamilyAestheticResult {
  const examples: FamilyAestheticResult["example_cocktails"] = [];
  for (const [name, entry] of atlas.cocktails) {
    if (entry.family === family) {
      examples.push({ name, color_description: entry.colorDescription, mood: entry.mood });
    }
  }

  return {
    family,
    characteristics: familyCharacteristicsOf(atlas, family),
    example_cocktails: examples.slice(0, FAMILY_EXAMPLE_LIMIT),
    total_in_family: examples.length
  };
}
