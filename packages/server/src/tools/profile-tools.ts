/**
 * Profile tools: derived cocktail profiles and prompt enhancement
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  enhancePromptWithCocktail,
  getCocktailProfile,
  getSpiritWarmth,
  getVisualParameters,
  listCocktails,
  searchCocktailsByFlavor,
  type ProfileCatalog
} from "@cocktail-aesthetics/core";
import { jsonResult } from "./tool-result.js";

const cocktailName = z
  .string()
  .describe('Cocktail name, e.g. "negroni", "Old Fashioned" or "mai-tai"');

export function registerProfileTools(server: McpServer, catalog: ProfileCatalog): void {
  server.registerTool(
    "list_cocktails",
    {
      title: "List Cocktails",
      description: "List every cocktail with a derived aesthetic profile."
    },
    async () => jsonResult(listCocktails(catalog))
  );

  server.registerTool(
    "get_cocktail_profile",
    {
      title: "Get Cocktail Profile",
      description: "Get the complete flavor and visual profile of a cocktail.",
      inputSchema: { cocktail_name: cocktailName }
    },
    async ({ cocktail_name }) => jsonResult(getCocktailProfile(catalog, cocktail_name))
  );

  server.registerTool(
    "get_visual_parameters",
    {
      title: "Get Visual Parameters",
      description:
        "Get the visual parameters (color, lighting, mood, composition, texture, temperature) " +
        "a cocktail maps to, for image or design work.",
      inputSchema: { cocktail_name: cocktailName }
    },
    async ({ cocktail_name }) => jsonResult(getVisualParameters(catalog, cocktail_name))
  );

  server.registerTool(
    "enhance_prompt_with_cocktail",
    {
      title: "Enhance Prompt With Cocktail",
      description:
        "Pair an image prompt with a cocktail's visual parameters and a suggested styling sentence.",
      inputSchema: {
        base_prompt: z.string().describe('The image description to enhance, e.g. "a leather armchair"'),
        cocktail_name: cocktailName
      }
    },
    async ({ base_prompt, cocktail_name }) =>
      jsonResult(enhancePromptWithCocktail(catalog, base_prompt, cocktail_name))
  );

  server.registerTool(
    "search_cocktails_by_flavor",
    {
      title: "Search Cocktails By Flavor",
      description: "Find cocktails whose primary flavor matches exactly.",
      inputSchema: {
        flavor: z
          .string()
          .describe("bitter, sweet, sour, spirit_forward, herbal, fruity, creamy, smoky or spiced")
      }
    },
    async ({ flavor }) => jsonResult(searchCocktailsByFlavor(catalog, flavor))
  );

  server.registerTool(
    "get_spirit_warmth",
    {
      title: "Get Spirit Warmth",
      description: "Get the warmth level (0-10) of a base spirit and how to read it visually.",
      inputSchema: {
        spirit_name: z.string().describe("rum, whiskey, cognac, mezcal, tequila, gin or vodka")
      }
    },
    async ({ spirit_name }) => jsonResult(getSpiritWarmth(spirit_name))
  );
}
