export {
  spiritBaseToWarmth,
  spiritBaseToColorCategory,
  flavorToMood,
  complexityToComposition,
  bitternessToLighting,
  warmthAndComplexityToLighting,
  textureFromComponents,
  warmthToTemperature,
  deriveSecondaryMoods,
  buildVisualParameters
} from "./aesthetic/visual-mapper.js";
export { cocktailToProfile } from "./aesthetic/profile-resolver.js";
export {
  LABEL_SETS,
  COCKTAIL_FAMILIES,
  ATLAS_MOODS,
  ATLAS_COLORS,
  isLabel,
  parseLabel,
  parseSpiritBase,
  parseFlavorType,
  parseComplexityLevel
} from "./labels.js";
export { UnknownLabelError, TaxonomyFormatError } from "./errors.js";
export {
  parseCocktailTaxonomy,
  loadCocktailTaxonomy,
  parseAestheticAtlas,
  loadAestheticAtlas
} from "./taxonomy/taxonomy-loader.js";
export { ProfileCatalog, getDefaultCatalog } from "./catalog/profile-catalog.js";
export { normalizeCocktailKey } from "./catalog/keys.js";
export {
  listCocktails,
  getCocktailProfile,
  getVisualParameters,
  enhancePromptWithCocktail,
  searchCocktailsByFlavor,
  getSpiritWarmth,
  isNotFound
} from "./queries/profile-queries.js";
export {
  enhanceWithCocktailAesthetic,
  listAvailableCocktails,
  getCocktailDetails,
  searchCocktailsByMood,
  searchCocktailsByColor,
  getCocktailFamilyAesthetic
} from "./queries/atlas-queries.js";
export type {
  SpiritBase,
  FlavorType,
  ComplexityLevel,
  ColorCategory,
  LightingStyle,
  MoodDescriptor,
  CompositionApproach,
  TextureQuality,
  TemperatureVibe,
  RawCocktailRecord,
  TaxonomyEntry,
  FlavorProfile,
  VisualParameters,
  VisualParameterInput,
  CocktailProfile,
  CocktailFamily,
  AtlasMood,
  AtlasColor,
  AtlasEntry,
  FamilyCharacteristics,
  AestheticAtlas,
  NotFoundResult,
  QueryResult
} from "./types.js";
export type { LabelCategory, LabelOf } from "./labels.js";
export type {
  TaxonomySource,
  SkippedEntry,
  ProfileCatalogOptions
} from "./catalog/profile-catalog.js";
