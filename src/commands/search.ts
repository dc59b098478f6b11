import { Command } from "commander";
import {
  formatAlbumsAsText,
  formatArtistsAsText,
  formatAsJson,
  formatPlaylistsAsText,
  formatSearchAsText,
  formatTracksAsText,
  normalizeFormat,
  normalizeLimit,
} from "../lib/formatting";
import { DEFAULT_SEARCH_LIMIT, type TidalClient } from "../services/tidal/client";
import type { TidalSearch } from "../services/tidal/models";
import { openClient, parseCount } from "./shared";

type SearchOptions = {
  limit?: number;
  type?: string;
  format?: string;
};

type SearchType = "all" | keyof TidalSearch;

const SEARCH_TYPES: readonly SearchType[] = [
  "all",
  "artists",
  "albums",
  "playlists",
  "tracks",
];

export function normalizeSearchType(value: string | undefined): SearchType {
  const normalized = (value ?? "all").toLowerCase();
  const match = SEARCH_TYPES.find((type) => type === normalized);
  if (match) return match;
  throw new Error(`Unsupported type. Use ${SEARCH_TYPES.join(", ")}.`);
}

function formatTypeAsText(
  type: keyof TidalSearch,
  term: string,
  result: TidalSearch
): string {
  const heading = `Results for "${term}"`;
  switch (type) {
    case "artists":
      return formatArtistsAsText(heading, result.artists.items);
    case "albums":
      return formatAlbumsAsText(heading, result.albums.items);
    case "playlists":
      return formatPlaylistsAsText(heading, result.playlists.items);
    case "tracks":
      return formatTracksAsText(heading, result.tracks.items);
  }
}

export async function runSearch(
  term: string,
  options: SearchOptions,
  client: TidalClient = openClient()
): Promise<void> {
  const format = normalizeFormat(options.format, ["text", "json"]);
  const type = normalizeSearchType(options.type);
  const limit = normalizeLimit(options.limit, DEFAULT_SEARCH_LIMIT);

  const result = await client.searches().find(term, limit);

  if (format === "json") {
    console.log(
      formatAsJson(type === "all" ? result : { [type]: result[type] })
    );
    return;
  }

  console.log(
    type === "all"
      ? formatSearchAsText(term, result)
      : formatTypeAsText(type, term, result)
  );
}

export function registerSearchCommand(program: Command): void {
  program
    .command("search <term>")
    .description("Search the TIDAL catalogue")
    .option(
      "--limit <count>",
      `Results per kind (default: ${DEFAULT_SEARCH_LIMIT})`,
      parseCount,
      DEFAULT_SEARCH_LIMIT
    )
    .option(
      "--type <type>",
      "Restrict output (all|artists|albums|playlists|tracks)",
      "all"
    )
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (term: string, options: SearchOptions) => {
      await runSearch(term, options);
    });
}
