import { describe, it } from "node:test";
import assert from "node:assert";
import { ProfileCatalog, getDefaultCatalog, type SkippedEntry } from "../catalog/profile-catalog.js";
import { normalizeCocktailKey } from "../catalog/keys.js";
import { listCocktails, getVisualParameters } from "../queries/profile-queries.js";
import type { TaxonomyEntry } from "../types.js";
import { buildEntry } from "./test-utils.js";

describe("normalizeCocktailKey", () => {
  it("should lowercase and turn spaces and hyphens into underscores", () => {
    assert.strictEqual(normalizeCocktailKey("Old Fashioned"), "old_fashioned");
    assert.strictEqual(normalizeCocktailKey("old-fashioned"), "old_fashioned");
    assert.strictEqual(normalizeCocktailKey("OLD_FASHIONED"), "old_fashioned");
    assert.strictEqual(normalizeCocktailKey("Corpse Reviver-2"), "corpse_reviver_2");
  });
});

describe("ProfileCatalog", () => {
  it("should not scan the taxonomy until first use", () => {
    let loads = 0;
    const catalog = new ProfileCatalog(() => {
      loads += 1;
      return [buildEntry("gimlet")];
    });

    assert.strictEqual(catalog.scanCount, 0);
    assert.strictEqual(loads, 0);

    catalog.get("gimlet");
    assert.strictEqual(catalog.scanCount, 1);
    assert.strictEqual(loads, 1);
  });

  it("should scan exactly once across several queries", () => {
    let loads = 0;
    const catalog = new ProfileCatalog(() => {
      loads += 1;
      return [buildEntry("gimlet"), buildEntry("tom_collins", { isEffervescent: true })];
    });

    listCocktails(catalog);
    getVisualParameters(catalog, "Tom Collins");
    catalog.ensureBuilt();

    assert.strictEqual(loads, 1);
    assert.strictEqual(catalog.scanCount, 1);
  });

  it("should resolve every spelling of a name to the same profile", () => {
    const catalog = new ProfileCatalog([buildEntry("old_fashioned", { name: "Old Fashioned" })]);

    const profile = catalog.get("Old Fashioned");
    assert.ok(profile);
    assert.strictEqual(catalog.get("old-fashioned"), profile);
    assert.strictEqual(catalog.get("OLD_FASHIONED"), profile);
    assert.strictEqual(catalog.get("old fashioned "), undefined);
  });

  it("should skip records that fail conversion and keep the rest", () => {
    const reported: SkippedEntry[] = [];
    const entries: TaxonomyEntry[] = [
      buildEntry("gimlet"),
      buildEntry("pisco_sour", { spiritBase: "pisco" }),
      buildEntry("gin_fizz", { isEffervescent: true })
    ];
    const catalog = new ProfileCatalog(entries, { onSkip: (skipped) => reported.push(skipped) });

    assert.deepStrictEqual(
      [...catalog.entries()].map(([id]) => id),
      ["gimlet", "gin_fizz"]
    );
    assert.strictEqual(catalog.size, 2);
    assert.strictEqual(reported.length, 1);
    assert.strictEqual(reported[0].id, "pisco_sour");
    assert.strictEqual(reported[0].error.name, "UnknownLabelError");
    assert.deepStrictEqual(catalog.skipped, reported);
    assert.strictEqual(catalog.get("pisco sour"), undefined);
  });

  it("should freeze cached profiles down to their nested lists", () => {
    const catalog = new ProfileCatalog([buildEntry("gimlet")]);
    const before = getVisualParameters(catalog, "gimlet");
    const profile = catalog.get("gimlet");
    assert.ok(profile);

    const { flavorProfile, visualParameters } = profile;
    for (const part of [
      profile,
      flavorProfile,
      flavorProfile.secondaryFlavors,
      visualParameters,
      visualParameters.colorPalette,
      visualParameters.secondaryMoods
    ]) {
      assert.strictEqual(Object.isFrozen(part), true);
    }

    assert.throws(() => Reflect.apply(Array.prototype.push, visualParameters.secondaryMoods, ["dark"]), TypeError);
    assert.strictEqual(Reflect.set(visualParameters, "lightingStyle", "neon_accent"), false);
    assert.strictEqual(Reflect.set(visualParameters.colorPalette, "length", 0), false);

    assert.deepStrictEqual(getVisualParameters(catalog, "gimlet"), before);
    assert.deepStrictEqual(before, {
      cocktail: "Test Sour",
      visual_parameters: {
        primary_color: "clear",
        color_palette: ["#FFFACD", "#F0E68C", "#FFFFFF"],
        lighting: "warm_side_lit",
        mood: "bold",
        secondary_moods: [],
        composition: "balanced",
        texture: "crystalline",
        temperature: "ambient"
      },
      composition_strategy: "balanced",
      temperature_vibe: "ambient",
      mood_keywords: ["bold"],
      accent_lighting: "diffused_soft"
    });
  });

  it("should propagate loader failures without marking the catalog built", () => {
    let attempts = 0;
    const catalog = new ProfileCatalog(() => {
      attempts += 1;
      if (attempts === 1) throw new Error("taxonomy unavailable");
      return [buildEntry("gimlet")];
    });

    assert.throws(() => catalog.ensureBuilt(), /taxonomy unavailable/);
    assert.strictEqual(catalog.scanCount, 0);
    assert.strictEqual(catalog.size, 1);
    assert.strictEqual(catalog.scanCount, 1);
  });
});

describe("getDefaultCatalog", () => {
  it("should build the bundled taxonomy without skipping anything", () => {
    const catalog = getDefaultCatalog();
    assert.strictEqual(catalog, getDefaultCatalog());
    assert.strictEqual(catalog.size, 8);
    assert.deepStrictEqual(catalog.skipped, []);
  });
});
