/**
 * Profile queries
 *
 * The operations behind the profile tools. Each takes the catalog it reads
 * from and returns plain JSON-ready objects with snake_case keys. A name
 * that does not resolve yields a NotFoundResult; nothing here throws for
 * missing data.
 */

import type { CocktailProfile, FlavorType, LightingStyle, MoodDescriptor, NotFoundResult, QueryResult } from "../types.js";
import type { ProfileCatalog } from "../catalog/profile-catalog.js";
import { bitternessToLighting } from "../aesthetic/visual-mapper.js";
import { isLabel } from "../labels.js";
import { SPIRIT_WARMTH, WARMTH_INTERPRETATION } from "../constants/aesthetic-config.js";

// ========================================
// Result shapes
// ========================================

export interface CocktailSummary {
  id: string;
  name: string;
  spirit_base: string;
  primary_flavor: string;
  description: string;
}

export interface CocktailListResult {
  cocktails: CocktailSummary[];
  count: number;
}

export interface VisualParametersView {
  primary_color: string;
  color_palette: string[];
  lighting: string;
  mood: string;
  secondary_moods: string[];
  composition: string;
  texture: string;
  temperature: string;
}

export interface CocktailProfileResult {
  name: string;
  spirit_base: string;
  primary_flavor: string;
  flavor_profile: {
    complexity: string;
    bitterness: number;
    sweetness: number;
    richness: number;
    warmth_level: number;
    secondary_flavors: FlavorType[];
  };
  visual_parameters: VisualParametersView;
  description: string;
}

export interface VisualParametersResult {
  cocktail: string;
  visual_parameters: VisualParametersView;
  composition_strategy: string;
  temperature_vibe: string;
  mood_keywords: MoodDescriptor[];
  /** Bitterness-derived lighting cue; never replaces visual_parameters.lighting */
  accent_lighting: LightingStyle;
}

export interface PromptEnhancementResult {
  original_prompt: string;
  cocktail: string;
  color_direction: string[];
  lighting_style: string;
  mood_keywords: MoodDescriptor[];
  composition_guide: string;
  texture_notes: string;
  temperature_vibe: string;
  suggested_enhancement: string;
}

export interface FlavorSearchResult {
  flavor: string;
  matches: Array<{ name: string; id: string; description: string }>;
  count: number;
}

export interface SpiritWarmthResult {
  spirit: string;
  warmth_level: number;
  interpretation: string;
}

// ========================================
// Helpers
// ========================================

function cocktailNotFound(name: string): NotFoundResult {
  return { error: `Cocktail '${name}' not found` };
}

/** Primary mood followed by the secondary moods in order */
export function moodKeywords(profile: CocktailProfile): MoodDescriptor[] {
  const { primaryMood, secondaryMoods } = profile.visualParameters;
  return [primaryMood, ...secondaryMoods];
}

export function toVisualParametersView(profile: CocktailProfile): VisualParametersView {
  const visual = profile.visualParameters;
  return {
    primary_color: visual.primaryColorCategory,
    color_palette: [...visual.colorPalette],
    lighting: visual.lightingStyle,
    mood: visual.primaryMood,
    secondary_moods: [...visual.secondaryMoods],
    composition: visual.compositionStrategy,
    texture: visual.textureQuality,
    temperature: visual.temperatureVibe
  };
}

/**
 * One-paragraph styling hint built from a profile's visual parameters.
 * Only the first two palette colors are quoted.
 */
export function buildSuggestedEnhancement(profile: CocktailProfile): string {
  const visual = profile.visualParameters;
  return (
    `Add these aesthetic qualities to your prompt: ${moodKeywords(profile).join(", ")}. ` +
    `Use ${visual.lightingStyle} lighting. ` +
    `Color palette suggestion: ${visual.colorPalette.slice(0, 2).join(", ")}. ` +
    `Composition: ${visual.compositionStrategy}. ` +
    `Texture: ${visual.textureQuality}.`
  );
}

// ========================================
// Queries
// ========================================

export function listCocktails(catalog: ProfileCatalog): CocktailListResult {
  const cocktails: CocktailSummary[] = [];
  for (const [id, profile] of catalog.entries()) {
    cocktails.push({
      id,
      name: profile.name,
      spirit_base: profile.spiritBase,
      primary_flavor: profile.primaryFlavor,
      description: profile.description
    });
  }
  return { cocktails, count: cocktails.length };
}

export function getCocktailProfile(
  catalog: ProfileCatalog,
  cocktailName: string
): QueryResult<CocktailProfileResult> {
  const profile = catalog.get(cocktailName);
  if (!profile) return cocktailNotFound(cocktailName);

  const flavor = profile.flavorProfile;
  return {
    name: profile.name,
    spirit_base: profile.spiritBase,
    primary_flavor: profile.primaryFlavor,
    flavor_profile: {
      complexity: flavor.complexity,
      bitterness: flavor.bitterness,
      sweetness: flavor.sweetness,
      richness: flavor.richness,
      warmth_level: flavor.warmthLevel,
      secondary_flavors: [...flavor.secondaryFlavors]
    },
    visual_parameters: toVisualParametersView(profile),
    description: profile.description
  };
}

export function getVisualParameters(
  catalog: ProfileCatalog,
  cocktailName: string
): QueryResult<VisualParametersResult> {
  const profile = catalog.get(cocktailName);
  if (!profile) return cocktailNotFound(cocktailName);

  const visual = profile.visualParameters;
  return {
    cocktail: profile.name,
    visual_parameters: toVisualParametersView(profile),
    composition_strategy: visual.compositionStrategy,
    temperature_vibe: visual.temperatureVibe,
    mood_keywords: moodKeywords(profile),
    accent_lighting: bitternessToLighting(profile.flavorProfile.bitterness)
  };
}

export function enhancePromptWithCocktail(
  catalog: ProfileCatalog,
  basePrompt: string,
  cocktailName: string
): QueryResult<PromptEnhancementResult> {
  const profile = catalog.get(cocktailName);
  if (!profile) return cocktailNotFound(cocktailName);

  const visual = profile.visualParameters;
  return {
    original_prompt: basePrompt,
    cocktail: profile.name,
    color_direction: [...visual.colorPalette],
    lighting_style: visual.lightingStyle,
    mood_keywords: moodKeywords(profile),
    composition_guide: visual.compositionStrategy,
    texture_notes: visual.textureQuality,
    temperature_vibe: visual.temperatureVibe,
    suggested_enhancement: buildSuggestedEnhancement(profile)
  };
}

/**
 * Cocktails whose primary flavor equals `flavor` (case-insensitive).
 * An unknown flavor simply has no matches.
 */
export function searchCocktailsByFlavor(catalog: ProfileCatalog, flavor: string): FlavorSearchResult {
  const flavorLower = flavor.toLowerCase();
  const matches: FlavorSearchResult["matches"] = [];

  for (const [id, profile] of catalog.entries()) {
    if (profile.primaryFlavor === flavorLower) {
      matches.push({ name: profile.name, id, description: profile.description });
    }
  }

  return { flavor: flavorLower, matches, count: matches.length };
}

/**
 * Warmth of a spirit straight from the warmth table, no profile involved.
 * Unlike spiritBaseToWarmth(), an unknown spirit is reported, not defaulted.
 */
export function getSpiritWarmth(spiritName: string): QueryResult<SpiritWarmthResult> {
  const spirit = spiritName.toLowerCase();
  if (!isLabel("spirit", spirit)) {
    return { error: `Spirit '${spiritName}' not recognized` };
  }

  const warmth = SPIRIT_WARMTH[spirit];
  let interpretation: string = WARMTH_INTERPRETATION.COOL.text;
  if (warmth >= WARMTH_INTERPRETATION.VERY_WARM.min) {
    interpretation = WARMTH_INTERPRETATION.VERY_WARM.text;
  } else if (warmth >= WARMTH_INTERPRETATION.WARM.min) {
    interpretation = WARMTH_INTERPRETATION.WARM.text;
  }

  return { spirit, warmth_level: warmth, interpretation };
}

export function isNotFound<T extends object>(result: QueryResult<T>): result is NotFoundResult {
  return "error" in result;
}
