import { describe, it } from "node:test";
import assert from "node:assert";
import { cocktailToProfile } from "../aesthetic/profile-resolver.js";
import { loadCocktailTaxonomy } from "../taxonomy/taxonomy-loader.js";
import { UnknownLabelError } from "../errors.js";
import { buildRecord } from "./test-utils.js";

describe("cocktailToProfile", () => {
  it("should derive a complete profile", () => {
    const profile = cocktailToProfile(
      buildRecord({
        name: "Placeholder Flip",
        spiritBase: "Cognac",
        primaryFlavor: "Creamy",
        complexity: "COMPLEX",
        bitterness: 1,
        sweetness: 7,
        richness: 9,
        colorPalette: ["#F5DEB3", "#8B4513"],
        hasCream: true,
        description: "Egg, cream and cognac."
      })
    );

    assert.deepStrictEqual(profile, {
      name: "Placeholder Flip",
      spiritBase: "cognac",
      primaryFlavor: "creamy",
      flavorProfile: {
        primaryFlavor: "creamy",
        secondaryFlavors: [],
        complexity: "complex",
        warmthLevel: 9,
        bitterness: 1,
        sweetness: 7,
        richness: 9
      },
      visualParameters: {
        primaryColorCategory: "amber",
        colorPalette: ["#F5DEB3", "#8B4513"],
        lightingStyle: "golden_hour",
        primaryMood: "nostalgic",
        secondaryMoods: ["elegant", "aromatic", "playful"],
        compositionStrategy: "layered",
        textureQuality: "creamy",
        temperatureVibe: "warm"
      },
      description: "Egg, cream and cognac."
    });
  });

  it("should fill defaults for omitted optional fields", () => {
    const profile = cocktailToProfile({ name: "Bare", spiritBase: "tequila", primaryFlavor: "sour" });

    assert.strictEqual(profile.flavorProfile.complexity, "moderate");
    assert.strictEqual(profile.flavorProfile.bitterness, 5);
    assert.strictEqual(profile.flavorProfile.sweetness, 5);
    assert.strictEqual(profile.flavorProfile.richness, 5);
    assert.deepStrictEqual(profile.visualParameters.colorPalette, []);
    assert.deepStrictEqual(profile.visualParameters.secondaryMoods, []);
    assert.strictEqual(profile.visualParameters.textureQuality, "crystalline");
    assert.strictEqual(profile.visualParameters.compositionStrategy, "balanced");
    assert.strictEqual(profile.description, "");
  });

  it("should fail on an unknown spirit", () => {
    assert.throws(
      () => cocktailToProfile(buildRecord({ spiritBase: "pisco" })),
      (err: unknown) => err instanceof UnknownLabelError && err.category === "spirit"
    );
  });

  it("should fail on an unknown flavor", () => {
    assert.throws(
      () => cocktailToProfile(buildRecord({ primaryFlavor: "salty" })),
      (err: unknown) => err instanceof UnknownLabelError && err.category === "flavor"
    );
  });

  it("should fail on an unknown complexity", () => {
    assert.throws(
      () => cocktailToProfile(buildRecord({ complexity: "intricate" })),
      (err: unknown) => err instanceof UnknownLabelError && err.category === "complexity"
    );
  });

  it("should be deterministic for every bundled record", () => {
    for (const { id, record } of loadCocktailTaxonomy()) {
      const first = cocktailToProfile(record);
      const second = cocktailToProfile(record);
      assert.deepStrictEqual(second, first, `profile for ${id} should not vary`);
      assert.notStrictEqual(second.visualParameters.colorPalette, first.visualParameters.colorPalette);
    }
  });
});
