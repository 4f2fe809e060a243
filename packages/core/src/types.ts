import type {
  SPIRIT_BASES,
  FLAVOR_TYPES,
  COMPLEXITY_LEVELS,
  COLOR_CATEGORIES,
  LIGHTING_STYLES,
  MOOD_DESCRIPTORS,
  COMPOSITION_APPROACHES,
  TEXTURE_QUALITIES,
  TEMPERATURE_VIBES,
  COCKTAIL_FAMILIES,
  ATLAS_MOODS,
  ATLAS_COLORS
} from "./labels.js";

// ============================================================================
// Categorical labels
// ============================================================================

export type SpiritBase = (typeof SPIRIT_BASES)[number];
export type FlavorType = (typeof FLAVOR_TYPES)[number];
/** simple = 2-3 ingredients, moderate = 4-5, complex = 6+ with layering */
export type ComplexityLevel = (typeof COMPLEXITY_LEVELS)[number];
export type ColorCategory = (typeof COLOR_CATEGORIES)[number];
export type LightingStyle = (typeof LIGHTING_STYLES)[number];
export type MoodDescriptor = (typeof MOOD_DESCRIPTORS)[number];
export type CompositionApproach = (typeof COMPOSITION_APPROACHES)[number];
export type TextureQuality = (typeof TEXTURE_QUALITIES)[number];
export type TemperatureVibe = (typeof TEMPERATURE_VIBES)[number];

// ============================================================================
// Taxonomy records
// ============================================================================

/**
 * A cocktail as authored in the taxonomy. Labels are still plain strings here;
 * they become typed labels only through cocktailToProfile().
 */
export interface RawCocktailRecord {
  name: string;
  spiritBase: string;
  primaryFlavor: string;
  complexity?: string;
  bitterness?: number; // 0-10
  sweetness?: number; // 0-10
  richness?: number; // 0-10: cream, fat, oils
  colorPalette?: string[]; // hex codes
  hasCream?: boolean;
  hasIce?: boolean;
  isEffervescent?: boolean;
  description?: string;
}

/** Taxonomy entry keyed by its canonical storage id ("old_fashioned"). */
export interface TaxonomyEntry {
  id: string;
  record: RawCocktailRecord;
}

// ============================================================================
// Derived profiles
// ============================================================================

export interface FlavorProfile {
  readonly primaryFlavor: FlavorType;
  /** Reserved; the taxonomy never populates it. */
  readonly secondaryFlavors: readonly FlavorType[];
  readonly complexity: ComplexityLevel;
  /** 0-10, derived from the spirit base alone */
  readonly warmthLevel: number;
  readonly bitterness: number;
  readonly sweetness: number;
  readonly richness: number;
}

export interface VisualParameters {
  readonly primaryColorCategory: ColorCategory;
  readonly colorPalette: readonly string[];
  readonly lightingStyle: LightingStyle;
  readonly primaryMood: MoodDescriptor;
  /** Zero to three moods, in accumulation order */
  readonly secondaryMoods: readonly MoodDescriptor[];
  readonly compositionStrategy: CompositionApproach;
  readonly textureQuality: TextureQuality;
  readonly temperatureVibe: TemperatureVibe;
}

export interface CocktailProfile {
  readonly name: string;
  readonly spiritBase: SpiritBase;
  readonly primaryFlavor: FlavorType;
  readonly flavorProfile: FlavorProfile;
  readonly visualParameters: VisualParameters;
  readonly description: string;
}

/**
 * Inputs of the visual-parameter orchestration. The three component flags
 * are optional and default to hasCream=false, hasIce=true, isEffervescent=false.
 */
export interface VisualParameterInput {
  spirit: SpiritBase;
  primaryFlavor: FlavorType;
  complexity: ComplexityLevel;
  bitterness: number;
  sweetness: number;
  richness: number;
  colorPalette: readonly string[];
  hasCream?: boolean;
  hasIce?: boolean;
  isEffervescent?: boolean;
}

// ============================================================================
// Aesthetic atlas (descriptive taxonomy)
// ============================================================================

export type CocktailFamily = (typeof COCKTAIL_FAMILIES)[number];
export type AtlasMood = (typeof ATLAS_MOODS)[number];
export type AtlasColor = (typeof ATLAS_COLORS)[number];

/**
 * Free-text aesthetic description of a cocktail. Unlike RawCocktailRecord,
 * nothing here is mapped; every field is returned as authored.
 */
export interface AtlasEntry {
  family: CocktailFamily;
  baseSpirit: string;
  colorPalette: string[];
  colorDescription: string;
  lighting: string;
  mood: string;
  composition: string;
  texture: string;
  culturalContext: string;
  temporalAssociation: string;
  technique: string;
}

export interface FamilyCharacteristics {
  description: string;
  lighting: string;
  mood: string;
  composition: string;
}

export interface AestheticAtlas {
  /** Keyed by canonical id, in authoring order */
  cocktails: ReadonlyMap<string, AtlasEntry>;
  families: ReadonlyMap<CocktailFamily, FamilyCharacteristics>;
}

// ============================================================================
// Query results
// ============================================================================

/** Returned instead of throwing when a lookup has no match. */
export interface NotFoundResult {
  error: string;
}

export type QueryResult<T> = T | NotFoundResult;
