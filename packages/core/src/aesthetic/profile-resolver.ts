import type { CocktailProfile, FlavorProfile, RawCocktailRecord } from "../types.js";
import { parseComplexityLevel, parseFlavorType, parseSpiritBase } from "../labels.js";
import { RECORD_DEFAULTS } from "../constants/aesthetic-config.js";
import { buildVisualParameters, spiritBaseToWarmth } from "./visual-mapper.js";

/**
 * Converts a raw taxonomy record into a complete CocktailProfile.
 *
 * Spirit, flavor and complexity labels are case-normalized and must be
 * recognized; an unknown label throws UnknownLabelError and no partial
 * profile is produced. Missing optional fields take RECORD_DEFAULTS.
 */
export function cocktailToProfile(record: RawCocktailRecord): CocktailProfile {
  const spiritBase = parseSpiritBase(record.spiritBase);
  const primaryFlavor = parseFlavorType(record.primaryFlavor);
  const complexity = parseComplexityLevel(record.complexity ?? RECORD_DEFAULTS.complexity);

  const bitterness = record.bitterness ?? RECORD_DEFAULTS.score;
  const sweetness = record.sweetness ?? RECORD_DEFAULTS.score;
  const richness = record.richness ?? RECORD_DEFAULTS.score;

  const flavorProfile: FlavorProfile = {
    primaryFlavor,
    secondaryFlavors: [],
    complexity,
    warmthLevel: spiritBaseToWarmth(spiritBase),
    bitterness,
    sweetness,
    richness
  };

  const visualParameters = buildVisualParameters({
    spirit: spiritBase,
    primaryFlavor,
    complexity,
    bitterness,
    sweetness,
    richness,
    colorPalette: record.colorPalette ?? [],
    hasCream: record.hasCream ?? RECORD_DEFAULTS.hasCream,
    hasIce: record.hasIce ?? RECORD_DEFAULTS.hasIce,
    isEffervescent: record.isEffervescent ?? RECORD_DEFAULTS.isEffervescent
  });

  return {
    name: record.name,
    spiritBase,
    primaryFlavor,
    flavorProfile,
    visualParameters,
    description: record.description ?? RECORD_DEFAULTS.description
  };
}
