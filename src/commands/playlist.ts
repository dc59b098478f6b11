import { Command } from "commander";
import {
  formatAsIds,
  formatAsJson,
  formatPlaylistLine,
  formatPlaylistsAsText,
  formatTracksAsText,
  normalizeFormat,
} from "../lib/formatting";
import type { TidalClient } from "../services/tidal/client";
import type { Track } from "../services/tidal/models";
import { openClient } from "./shared";

type FormatOptions = {
  format?: string;
};

type CreateOptions = FormatOptions & {
  description?: string;
};

type UpdateOptions = FormatOptions & {
  title?: string;
  description?: string;
};

type AddOptions = FormatOptions & {
  allowDuplicates?: boolean;
};

export function parseTrackIds(values: string[]): number[] {
  const ids = values
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  return ids.map((value) => {
    const id = Number(value);
    if (!Number.isInteger(id) || id <= 0) {
      throw new Error(`Invalid track id: ${value}`);
    }
    return id;
  });
}

export async function runPlaylistShow(
  id: string,
  options: FormatOptions,
  client: TidalClient = openClient()
): Promise<void> {
  const format = normalizeFormat(options.format, ["text", "json"]);
  const playlist = await client.playlists().get(id);
  if (format === "json") {
    console.log(formatAsJson(playlist));
    return;
  }
  const lines = [formatPlaylistLine(playlist)];
  if (playlist.description) {
    lines.push(`  ${playlist.description}`);
  }
  console.log(lines.join("\n"));
}

export async function runPlaylistTracks(
  id: string,
  options: FormatOptions,
  client: TidalClient = openClient()
): Promise<void> {
  const format = normalizeFormat(options.format);
  const tracks = await client.playlists().tracks(id);

  if (format === "json") {
    console.log(formatAsJson({ count: tracks.length, tracks }));
    return;
  }
  if (format === "ids") {
    const output = formatAsIds(tracks);
    if (output.length > 0) {
      console.log(output);
    }
    return;
  }
  console.log(formatTracksAsText("Playlist", tracks));
}

export async function runPlaylistList(
  options: FormatOptions,
  client: TidalClient = openClient()
): Promise<void> {
  const format = normalizeFormat(options.format, ["text", "json"]);
  const playlists = await client.playlists().userPlaylists();
  if (format === "json") {
    console.log(formatAsJson({ count: playlists.length, playlists }));
    return;
  }
  console.log(formatPlaylistsAsText("Your playlists", playlists));
}

export async function runPlaylistCreate(
  title: string,
  options: CreateOptions,
  client: TidalClient = openClient()
): Promise<void> {
  const format = normalizeFormat(options.format, ["text", "json"]);
  const playlist = await client
    .playlists()
    .create(title, options.description ?? "");
  if (format === "json") {
    console.log(formatAsJson(playlist));
    return;
  }
  console.log(`Created ${formatPlaylistLine(playlist)}`);
}

export async function runPlaylistUpdate(
  id: string,
  options: UpdateOptions,
  client: TidalClient = openClient()
): Promise<void> {
  const format = normalizeFormat(options.format, ["text", "json"]);
  const playlist = await client.playlists().update(id, {
    title: options.title,
    description: options.description,
  });
  if (format === "json") {
    console.log(formatAsJson(playlist));
    return;
  }
  console.log(`Updated ${formatPlaylistLine(playlist)}`);
}

export async function runPlaylistAdd(
  id: string,
  trackIds: string[],
  options: AddOptions,
  client: TidalClient = openClient()
): Promise<void> {
  const format = normalizeFormat(options.format, ["text", "json"]);
  const tracks: Track[] = parseTrackIds(trackIds).map((trackId) => ({ id: trackId }));
  if (tracks.length === 0) {
    throw new Error("No track ids given.");
  }

  const playlist = await client
    .playlists()
    .addTracks(id, tracks, options.allowDuplicates ?? false);
  if (format === "json") {
    console.log(formatAsJson(playlist));
    return;
  }
  console.log(`Added ${tracks.length} tracks to ${formatPlaylistLine(playlist)}`);
}

export function registerPlaylistCommand(program: Command): void {
  const playlistCmd = program
    .command("playlist")
    .description("Read and edit playlists");

  playlistCmd
    .command("show <id>")
    .description("Show a playlist")
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (id: string, options: FormatOptions) => {
      await runPlaylistShow(id, options);
    });

  playlistCmd
    .command("tracks <id>")
    .description("List the tracks of a playlist")
    .option("--format <format>", "Output format (text|json|ids)", "text")
    .action(async (id: string, options: FormatOptions) => {
      await runPlaylistTracks(id, options);
    });

  playlistCmd
    .command("list")
    .description("List your playlists")
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (options: FormatOptions) => {
      await runPlaylistList(options);
    });

  playlistCmd
    .command("create <title>")
    .description("Create a playlist")
    .option("--description <text>", "Playlist description")
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (title: string, options: CreateOptions) => {
      await runPlaylistCreate(title, options);
    });

  playlistCmd
    .command("update <id>")
    .description("Rename or re-describe a playlist")
    .option("--title <title>", "New title")
    .option("--description <text>", "New description")
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (id: string, options: UpdateOptions) => {
      await runPlaylistUpdate(id, options);
    });

  playlistCmd
    .command("add <id> <trackIds...>")
    .description("Add tracks to a playlist")
    .option("--allow-duplicates", "Add tracks already in the playlist again")
    .option("--format <format>", "Output format (text|json)", "text")
    .action(async (id: string, trackIds: string[], options: AddOptions) => {
      await runPlaylistAdd(id, trackIds, options);
    });
}
