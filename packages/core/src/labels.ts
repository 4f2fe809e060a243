/**
 * Closed label sets and their string conversions.
 *
 * Each category is a readonly tuple; the matching union type in types.ts is
 * derived from it, so adding a label here is the only change needed to
 * extend a category.
 */

import { UnknownLabelError } from "./errors.js";
import type { SpiritBase, FlavorType, ComplexityLevel } from "./types.js";

export const SPIRIT_BASES = ["rum", "whiskey", "vodka", "gin", "tequila", "cognac", "mezcal"] as const;

export const FLAVOR_TYPES = [
  "bitter",
  "sweet",
  "sour",
  "spirit_forward",
  "herbal",
  "fruity",
  "creamy",
  "spiced",
  "smoky"
] as const;

export const COMPLEXITY_LEVELS = ["simple", "moderate", "complex"] as const;

export const COLOR_CATEGORIES = [
  "amber",
  "ruby",
  "golden",
  "clear",
  "dark",
  "tropical",
  "green",
  "purple"
] as const;

export const LIGHTING_STYLES = [
  "warm_side_lit",
  "tiki_torch",
  "golden_hour",
  "moody_amber",
  "crisp_backlit",
  "neon_accent",
  "diffused_soft",
  "dramatic_shadow"
] as const;

export const MOOD_DESCRIPTORS = [
  "sophisticated",
  "tropical",
  "nostalgic",
  "bold",
  "elegant",
  "playful",
  "dark",
  "aromatic"
] as const;

export const COMPOSITION_APPROACHES = [
  "balanced",
  "layered",
  "minimalist",
  "dramatic",
  "garnish_focused"
] as const;

export const TEXTURE_QUALITIES = [
  "smooth",
  "crystalline",
  "creamy",
  "oily",
  "effervescent",
  "translucent",
  "opaque",
  "foamy"
] as const;

export const TEMPERATURE_VIBES = ["warm", "hot", "cool", "icy", "ambient"] as const;

export const LABEL_SETS = {
  spirit: SPIRIT_BASES,
  flavor: FLAVOR_TYPES,
  complexity: COMPLEXITY_LEVELS,
  color: COLOR_CATEGORIES,
  lighting: LIGHTING_STYLES,
  mood: MOOD_DESCRIPTORS,
  composition: COMPOSITION_APPROACHES,
  texture: TEXTURE_QUALITIES,
  temperature: TEMPERATURE_VIBES
} as const;

export type LabelCategory = keyof typeof LABEL_SETS;
export type LabelOf<C extends LabelCategory> = (typeof LABEL_SETS)[C][number];

/**
 * Non-throwing membership check. The value is compared as given;
 * use parseLabel() for case-normalized input.
 */
export function isLabel<C extends LabelCategory>(category: C, value: string): value is LabelOf<C> {
  const allowed: readonly string[] = LABEL_SETS[category];
  return allowed.includes(value);
}

/**
 * Lowercases `value`, then returns it as a label of `category`.
 * Throws UnknownLabelError when it is not one.
 */
export function parseLabel<C extends LabelCategory>(category: C, value: string): LabelOf<C> {
  const normalized = value.toLowerCase();
  if (!isLabel(category, normalized)) {
    throw new UnknownLabelError(category, value, LABEL_SETS[category]);
  }
  return normalized;
}

export const parseSpiritBase = (value: string): SpiritBase => parseLabel("spirit", value);
export const parseFlavorType = (value: string): FlavorType => parseLabel("flavor", value);
export const parseComplexityLevel = (value: string): ComplexityLevel => parseLabel("complexity", value);

// ============================================================================
// Aesthetic atlas vocabularies
// ============================================================================

export const COCKTAIL_FAMILIES = [
  "spirit_forward",
  "sour",
  "tiki",
  "highball",
  "after_dinner",
  "floral_sour",
  "spritz",
  "modern_classic"
] as const;

/** Mood words searched for in the atlas' free-text mood descriptions */
export const ATLAS_MOODS = [
  "sophisticated",
  "refreshing",
  "escapist",
  "contemplative",
  "festive",
  "elegant",
  "playful",
  "mysterious",
  "indulgent"
] as const;

export const ATLAS_COLORS = ["red", "amber", "golden", "clear", "green", "purple", "orange", "dark", "pale"] as const;
