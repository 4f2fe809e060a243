/**
 * Atlas tools: descriptive aesthetics for a wider cocktail list
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  ATLAS_COLORS,
  ATLAS_MOODS,
  COCKTAIL_FAMILIES,
  enhanceWithCocktailAesthetic,
  getCocktailDetails,
  getCocktailFamilyAesthetic,
  listAvailableCocktails,
  searchCocktailsByColor,
  searchCocktailsByMood,
  type AestheticAtlas
} from "@cocktail-aesthetics/core";
import { jsonResult } from "./tool-result.js";

const cocktailArg = z.string().describe('Cocktail name, e.g. "negroni", "mai tai" or "martini"');

export function registerAtlasTools(server: McpServer, atlas: AestheticAtlas): void {
  server.registerTool(
    "enhance_with_cocktail_aesthetic",
    {
      title: "Enhance With Cocktail Aesthetic",
      description:
        "Map a cocktail to visual enhancement parameters for an image prompt. " +
        "The result is structured data meant to be woven into natural language.",
      inputSchema: {
        base_prompt: z.string().describe('The image description, e.g. "portrait of a chef"'),
        cocktail: cocktailArg
      }
    },
    async ({ base_prompt, cocktail }) => jsonResult(enhanceWithCocktailAesthetic(atlas, base_prompt, cocktail))
  );

  server.registerTool(
    "list_available_cocktails",
    {
      title: "List Available Cocktails",
      description: "List the atlas cocktails grouped by family with brief descriptions."
    },
    async () => jsonResult(listAvailableCocktails(atlas))
  );

  server.registerTool(
    "get_cocktail_details",
    {
      title: "Get Cocktail Details",
      description: "Get the full aesthetic profile of an atlas cocktail and its family.",
      inputSchema: { cocktail: cocktailArg }
    },
    async ({ cocktail }) => jsonResult(getCocktailDetails(atlas, cocktail))
  );

  server.registerTool(
    "search_cocktails_by_mood",
    {
      title: "Search Cocktails By Mood",
      description: "Find cocktails whose mood description mentions the given mood.",
      inputSchema: { mood: z.enum(ATLAS_MOODS).describe("Desired mood or atmosphere") }
    },
    async ({ mood }) => jsonResult(searchCocktailsByMood(atlas, mood))
  );

  server.registerTool(
    "search_cocktails_by_color",
    {
      title: "Search Cocktails By Color",
      description: "Find cocktails by their dominant color palette.",
      inputSchema: { color_preference: z.enum(ATLAS_COLORS).describe("Desired color family") }
    },
    async ({ color_preference }) => jsonResult(searchCocktailsByColor(atlas, color_preference))
  );

  server.registerTool(
    "get_cocktail_family_aesthetic",
    {
      title: "Get Cocktail Family Aesthetic",
      description: "Get the shared aesthetic of a cocktail family with example cocktails.",
      inputSchema: { family: z.enum(COCKTAIL_FAMILIES).describe("Cocktail family") }
    },
    async ({ family }) => jsonResult(getCocktailFamilyAesthetic(atlas, family))
  );
}
