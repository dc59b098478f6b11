import { Command } from "commander";
import {
  formatAlbumLine,
  formatAsIds,
  formatAsJson,
  formatTracksAsText,
  normalizeFormat,
} from "../lib/formatting";
import type { TidalClient } from "../services/tidal/client";
import { openClient } from "./shared";

type AlbumOptions = {
  tracks?: boolean;
  format?: string;
};

export async function runAlbum(
  id: string,
  options: AlbumOptions,
  client: TidalClient = openClient()
): Promise<void> {
  const format = normalizeFormat(options.format);

  if (format === "ids") {
    const output = formatAsIds(await client.albums().tracks(id));
    if (output.length > 0) {
      console.log(output);
    }
    return;
  }

  const album = await client.albums().get(id);
  const tracks = options.tracks ? await client.albums().tracks(id) : undefined;

  if (format === "json") {
    console.log(formatAsJson(tracks ? { album, tracks } : { album }));
    return;
  }

  const lines = [formatAlbumLine(album)];
  if (tracks) {
    lines.push(formatTracksAsText("Tracks", tracks));
  }
  console.log(lines.join("\n"));
}

export function registerAlbumCommand(program: Command): void {
  program
    .command("album <id>")
    .description("Show an album")
    .option("--tracks", "Also list the album's tracks")
    .option("--format <format>", "Output format (text|json|ids)", "text")
    .action(async (id: string, options: AlbumOptions) => {
      await runAlbum(id, options);
    });
}
