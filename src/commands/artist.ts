import { Command } from "commander";
import {
  formatAlbumsAsText,
  formatArtistLine,
  formatAsJson,
  normalizeFormat,
} from "../lib/formatting";
import type { TidalClient } from "../services/tidal/client";
import { openClient } from "./shared";

type ArtistOptions = {
  albums?: boolean;
  format?: string;
};

export async function runArtist(
  id: string,
  options: ArtistOptions,
  client: TidalClient = openClient()
): Promise<void> {
  const format = normalizeFormat(options.format, ["text", "json"]);
  const artist = await client.artists().get(id);
  const albums = options.albums ? await client.artists().albums(id) : undefined;

  if (format === "json") {
    console.log(formatAsJson(albums ? { artist, albums } : { artist }));
    return;
  }

  const lines = [formatArtistLine(artist)];
  if (albums) {
    lines.push(formatAlbumsAsText("Albums", albums));
  }
  console.log(lines.join("\n"));
}

export function registerArtistCommand(program: Command): void {
  program
    .command("artist <id>")
    .description("Show an artist")
    .option("--albums", "Also list the artist's albums")
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (id: string, options: ArtistOptions) => {
      await runArtist(id, options);
    });
}
