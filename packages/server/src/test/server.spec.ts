import { describe, it } from "node:test";
import assert from "node:assert";
import { z } from "zod";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import {
  ProfileCatalog,
  getCocktailProfile,
  loadAestheticAtlas,
  loadCocktailTaxonomy,
  type TaxonomyEntry
} from "@cocktail-aesthetics/core";
import { createAestheticsServer, type AestheticsServerOptions } from "../server.js";
import { DEFAULT_SERVER_CONFIG } from "../config.js";

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })).length(1),
  isError: z.boolean().optional()
});

async function connect(options: AestheticsServerOptions) {
  const server = createAestheticsServer(options);
  const client = new Client({ name: "test-client", version: "0.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

  return {
    client,
    async call(name: string, args: Record<string, unknown> = {}) {
      const result = toolResultSchema.parse(await client.callTool({ name, arguments: args }));
      const payload: unknown = JSON.parse(result.content[0].text);
      return { payload, isError: result.isError };
    },
    async close() {
      await client.close();
      await server.close();
    }
  };
}

function bundledOptions(): AestheticsServerOptions {
  return {
    catalog: new ProfileCatalog(loadCocktailTaxonomy()),
    atlas: loadAestheticAtlas(),
    config: DEFAULT_SERVER_CONFIG
  };
}

const PROFILE_TOOLS = [
  "enhance_prompt_with_cocktail",
  "get_cocktail_profile",
  "get_spirit_warmth",
  "get_visual_parameters",
  "list_cocktails",
  "search_cocktails_by_flavor"
];

const ATLAS_TOOLS = [
  "enhance_with_cocktail_aesthetic",
  "get_cocktail_details",
  "get_cocktail_family_aesthetic",
  "list_available_cocktails",
  "search_cocktails_by_color",
  "search_cocktails_by_mood"
];

describe("createAestheticsServer", () => {
  it("should register both toolsets by default", async () => {
    const connection = await connect(bundledOptions());
    try {
      const { tools } = await connection.client.listTools();
      assert.deepStrictEqual(
        tools.map((tool) => tool.name).sort(),
        [...PROFILE_TOOLS, ...ATLAS_TOOLS].sort()
      );
    } finally {
      await connection.close();
    }
  });

  it("should register only the configured toolsets", async () => {
    const connection = await connect({
      ...bundledOptions(),
      config: { ...DEFAULT_SERVER_CONFIG, toolsets: ["atlas"] }
    });
    try {
      const { tools } = await connection.client.listTools();
      assert.deepStrictEqual(tools.map((tool) => tool.name).sort(), ATLAS_TOOLS);
    } finally {
      await connection.close();
    }
  });

  it("should return profiles as JSON text", async () => {
    const options = bundledOptions();
    const connection = await connect(options);
    try {
      const { payload, isError } = await connection.call("get_cocktail_profile", {
        cocktail_name: "old-fashioned"
      });
      assert.notStrictEqual(isError, true);
      assert.ok(options.catalog);
      assert.deepStrictEqual(payload, getCocktailProfile(options.catalog, "Old Fashioned"));
    } finally {
      await connection.close();
    }
  });

  it("should return not-found lookups as ordinary results", async () => {
    const connection = await connect(bundledOptions());
    try {
      const { payload, isError } = await connection.call("get_visual_parameters", {
        cocktail_name: "Zombie"
      });
      assert.notStrictEqual(isError, true);
      assert.deepStrictEqual(payload, { error: "Cocktail 'Zombie' not found" });
    } finally {
      await connection.close();
    }
  });

  it("should scan the taxonomy once across tool calls", async () => {
    const entries: TaxonomyEntry[] = [
      {
        id: "test_fizz",
        record: {
          name: "Test Fizz",
          spiritBase: "gin",
          primaryFlavor: "sour",
          isEffervescent: true,
          description: "A placeholder fizz."
        }
      }
    ];
    const catalog = new ProfileCatalog(entries);
    const connection = await connect({ ...bundledOptions(), catalog });
    try {
      const list = await connection.call("list_cocktails");
      assert.deepStrictEqual(list.payload, {
        cocktails: [
          {
            id: "test_fizz",
            name: "Test Fizz",
            spirit_base: "gin",
            primary_flavor: "sour",
            description: "A placeholder fizz."
          }
        ],
        count: 1
      });

      const search = await connection.call("search_cocktails_by_flavor", { flavor: "SOUR" });
      assert.deepStrictEqual(search.payload, {
        flavor: "sour",
        matches: [{ name: "Test Fizz", id: "test_fizz", description: "A placeholder fizz." }],
        count: 1
      });
      assert.strictEqual(catalog.scanCount, 1);
    } finally {
      await connection.close();
    }
  });

  it("should answer spirit warmth lookups", async () => {
    const connection = await connect(bundledOptions());
    try {
      const { payload } = await connection.call("get_spirit_warmth", { spirit_name: "Vodka" });
      assert.deepStrictEqual(payload, {
        spirit: "vodka",
        warmth_level: 3,
        interpretation: "cool, crisp, clean"
      });
    } finally {
      await connection.close();
    }
  });

  it("should search the atlas by color", async () => {
    const connection = await connect(bundledOptions());
    try {
      const { payload } = await connection.call("search_cocktails_by_color", { color_preference: "purple" });
      assert.deepStrictEqual(payload, {
        color_query: "purple",
        matches_found: 1,
        cocktails: [
          {
            name: "aviation",
            color_description: "pale sky blue-violet from crème de violette",
            color_palette: ["#E6E6FA", "#DDA0DD", "#F0E68C"],
            lighting: "soft diffused ethereal, cloud-filtered light, lavender haze"
          }
        ]
      });
    } finally {
      await connection.close();
    }
  });

  it("should echo the requested name in atlas enhancements", async () => {
    const connection = await connect(bundledOptions());
    try {
      const { payload } = await connection.call("enhance_with_cocktail_aesthetic", {
        base_prompt: "a bottle of hot sauce",
        cocktail: "Mai Tai"
      });
      const enhancement = z
        .object({ cocktail_name: z.string(), cocktail_metadata: z.object({ family: z.string() }) })
        .parse(payload);
      assert.strictEqual(enhancement.cocktail_name, "Mai Tai");
      assert.strictEqual(enhancement.cocktail_metadata.family, "tiki");
    } finally {
      await connection.close();
    }
  });

  it("should reject moods outside the allowed list", async () => {
    const connection = await connect(bundledOptions());
    try {
      // Older SDK releases reject the request; newer ones return an error result.
      const rejected = await connection.call("search_cocktails_by_mood", { mood: "gloomy" }).then(
        (result) => result.isError === true,
        () => true
      );
      assert.strictEqual(rejected, true);
    } finally {
      await connection.close();
    }
  });
});
