/**
 * Aesthetic Mapping Constants
 *
 * Lookup tables and thresholds used by the cocktail → visual mappings.
 * Every mapping falls back to the matching DEFAULT_* value for labels
 * missing from its table.
 */

import type {
  ColorCategory,
  ComplexityLevel,
  CompositionApproach,
  FlavorType,
  MoodDescriptor,
  SpiritBase
} from "../types.js";

/**
 * Perceived thermal/nostalgic warmth of each spirit (0-10)
 */
export const SPIRIT_WARMTH: Readonly<Record<SpiritBase, number>> = {
  rum: 9, // dark, caramel, tropical
  whiskey: 8, // oak, amber
  cognac: 9, // rich, luxurious
  mezcal: 8, // smoky, earthy
  tequila: 7, // bright but earthy
  gin: 5, // crisp, herbal
  vodka: 3 // clean, neutral
};

export const DEFAULT_WARMTH = 5;

export const SPIRIT_COLOR: Readonly<Record<SpiritBase, ColorCategory>> = {
  rum: "golden",
  whiskey: "amber",
  cognac: "amber",
  mezcal: "golden",
  tequila: "clear",
  gin: "clear",
  vodka: "clear"
};

export const DEFAULT_COLOR_CATEGORY: ColorCategory = "clear";

export const FLAVOR_MOOD: Readonly<Record<FlavorType, MoodDescriptor>> = {
  bitter: "sophisticated",
  sweet: "playful",
  spirit_forward: "bold",
  herbal: "elegant",
  fruity: "tropical",
  creamy: "nostalgic",
  smoky: "dark",
  sour: "bold",
  spiced: "aromatic"
};

export const DEFAULT_MOOD: MoodDescriptor = "sophisticated";

export const COMPLEXITY_COMPOSITION: Readonly<Record<ComplexityLevel, CompositionApproach>> = {
  simple: "minimalist",
  moderate: "balanced",
  complex: "layered"
};

export const DEFAULT_COMPOSITION: CompositionApproach = "balanced";

/**
 * Warmth thresholds shared by lighting and temperature derivation
 */
export const WARMTH_THRESHOLD = {
  /** At or above: golden_hour/moody_amber lighting, warm temperature */
  WARM: 8,

  /** At or below: crisp_backlit lighting */
  COOL_LIGHTING: 4,

  /** At or below: icy temperature */
  ICY: 3
} as const;

/**
 * Bitterness thresholds for the accent lighting mapping
 */
export const BITTERNESS_THRESHOLD = {
  DRAMATIC: 7,
  SIDE_LIT: 5
} as const;

/**
 * Secondary mood accumulation thresholds
 */
export const SECONDARY_MOOD_THRESHOLD = {
  /** richness at or above appends "elegant" */
  RICHNESS: 7,

  /** sweetness at or above appends "playful" */
  SWEETNESS: 6
} as const;

/**
 * Spirit warmth interpretation bands for the warmth lookup
 */
export const WARMTH_INTERPRETATION = {
  VERY_WARM: { min: 8, text: "very warm, golden, nostalgic" },
  WARM: { min: 6, text: "warm, moderate, balanced" },
  COOL: { text: "cool, crisp, clean" }
} as const;

/**
 * Defaults applied to optional fields of a raw taxonomy record
 */
export const RECORD_DEFAULTS = {
  complexity: "moderate",
  score: 5,
  hasCream: false,
  hasIce: true,
  isEffervescent: false,
  description: ""
} as const;
