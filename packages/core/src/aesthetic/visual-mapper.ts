import type {
  ColorCategory,
  ComplexityLevel,
  CompositionApproach,
  LightingStyle,
  MoodDescriptor,
  TemperatureVibe,
  TextureQuality,
  VisualParameterInput,
  VisualParameters
} from "../types.js";
import { isLabel } from "../labels.js";
import {
  BITTERNESS_THRESHOLD,
  COMPLEXITY_COMPOSITION,
  DEFAULT_COLOR_CATEGORY,
  DEFAULT_COMPOSITION,
  DEFAULT_MOOD,
  DEFAULT_WARMTH,
  FLAVOR_MOOD,
  RECORD_DEFAULTS,
  SECONDARY_MOOD_THRESHOLD,
  SPIRIT_COLOR,
  SPIRIT_WARMTH,
  WARMTH_THRESHOLD
} from "../constants/aesthetic-config.js";

// The single-label mappings accept any string: labels outside the table
// resolve to the table's default instead of failing.

/**
 * Spirit base → warmth level (0-10)
 */
export function spiritBaseToWarmth(spirit: string): number {
  return isLabel("spirit", spirit) ? SPIRIT_WARMTH[spirit] : DEFAULT_WARMTH;
}

/**
 * Spirit base → dominant color category
 */
export function spiritBaseToColorCategory(spirit: string): ColorCategory {
  return isLabel("spirit", spirit) ? SPIRIT_COLOR[spirit] : DEFAULT_COLOR_CATEGORY;
}

/**
 * Primary flavor → primary mood
 */
export function flavorToMood(flavor: string): MoodDescriptor {
  return isLabel("flavor", flavor) ? FLAVOR_MOOD[flavor] : DEFAULT_MOOD;
}

/**
 * Complexity → composition strategy.
 * More complex drinks benefit from showing ingredient layering.
 */
export function complexityToComposition(complexity: string): CompositionApproach {
  return isLabel("complexity", complexity) ? COMPLEXITY_COMPOSITION[complexity] : DEFAULT_COMPOSITION;
}

/**
 * Bitterness → accent lighting.
 * Bitter drinks get high-contrast light, sweet ones soft diffused light.
 *
 * Not part of buildVisualParameters(): the final lighting style always comes
 * from warmthAndComplexityToLighting(). This value is reported alongside it
 * as a secondary cue.
 */
export function bitternessToLighting(bitterness: number): LightingStyle {
  if (bitterness >= BITTERNESS_THRESHOLD.DRAMATIC) return "dramatic_shadow";
  if (bitterness >= BITTERNESS_THRESHOLD.SIDE_LIT) return "warm_side_lit";
  return "diffused_soft";
}

/**
 * (warmth, complexity) → lighting style used in the final profile
 */
export function warmthAndComplexityToLighting(warmth: number, complexity: ComplexityLevel): LightingStyle {
  if (warmth >= WARMTH_THRESHOLD.WARM && complexity === "complex") return "golden_hour"; // tiki/tropical
  if (warmth >= WARMTH_THRESHOLD.WARM) return "moody_amber";
  if (warmth <= WARMTH_THRESHOLD.COOL_LIGHTING) return "crisp_backlit";
  return "warm_side_lit";
}

/**
 * Physical components → visible texture.
 * Priority: cream > effervescence > ice > none.
 */
export function textureFromComponents(
  hasCream: boolean,
  hasIce: boolean,
  isEffervescent: boolean
): TextureQuality {
  if (hasCream) return "creamy";
  if (isEffervescent) return "effervescent";
  if (hasIce) return "crystalline";
  return "translucent";
}

export function warmthToTemperature(warmth: number): TemperatureVibe {
  if (warmth >= WARMTH_THRESHOLD.WARM) return "warm";
  if (warmth <= WARMTH_THRESHOLD.ICY) return "icy";
  return "ambient";
}

/**
 * Accumulates secondary moods. Each check appends at most one mood and the
 * order is fixed (elegant, aromatic, playful), so consumers reading only a
 * prefix see the same moods first.
 */
export function deriveSecondaryMoods(
  richness: number,
  complexity: ComplexityLevel,
  sweetness: number
): MoodDescriptor[] {
  const moods: MoodDescriptor[] = [];
  if (richness >= SECONDARY_MOOD_THRESHOLD.RICHNESS) moods.push("elegant");
  if (complexity === "complex") moods.push("aromatic");
  if (sweetness >= SECONDARY_MOOD_THRESHOLD.SWEETNESS) moods.push("playful");
  return moods;
}

/**
 * Composes every mapping into a complete VisualParameters record.
 *
 * @param input - Categorical and numeric cocktail characteristics
 * @returns Visual parameters; the palette is copied, not shared
 */
export function buildVisualParameters(input: VisualParameterInput): VisualParameters {
  const {
    spirit,
    primaryFlavor,
    complexity,
    sweetness,
    richness,
    colorPalette,
    hasCream = RECORD_DEFAULTS.hasCream,
    hasIce = RECORD_DEFAULTS.hasIce,
    isEffervescent = RECORD_DEFAULTS.isEffervescent
  } = input;

  const warmth = spiritBaseToWarmth(spirit);

  return {
    primaryColorCategory: spiritBaseToColorCategory(spirit),
    colorPalette: [...colorPalette],
    lightingStyle: warmthAndComplexityToLighting(warmth, complexity),
    primaryMood: flavorToMood(primaryFlavor),
    secondaryMoods: deriveSecondaryMoods(richness, complexity, sweetness),
    compositionStrategy: complexityToComposition(complexity),
    textureQuality: textureFromComponents(hasCream, hasIce, isEffervescent),
    temperatureVibe: warmthToTemperature(warmth)
  };
}
