import type {
  Album,
  Artist,
  Playlist,
  TidalSearch,
  Track,
} from "../services/tidal/models";

export type OutputFormat = "json" | "text" | "ids";

export function normalizeFormat(
  value: string | undefined,
  allowed: readonly OutputFormat[] = ["text", "json", "ids"]
): OutputFormat {
  const normalized = (value ?? "text").toLowerCase();
  const match = allowed.find((format) => format === normalized);
  if (match) return match;
  throw new Error(`Unsupported format. Use ${allowed.join(", ")}.`);
}

export function normalizeLimit(value: number | undefined, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.floor(value);
}

function formatLabel(value: string | null | undefined): string {
  if (!value) return "Unknown";
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : "Unknown";
}

export function formatDuration(seconds: number | null | undefined): string {
  if (!seconds || seconds <= 0) return "?:??";
  return `${Math.floor(seconds / 60)}:${String(seconds % 60).padStart(2, "0")}`;
}

function formatId(id: number | string | null | undefined): string {
  return id == null ? "?" : String(id);
}

function trackArtist(track: Track): string {
  const names = (track.artists ?? [])
    .map((artist) => artist.name)
    .filter((name): name is string => Boolean(name));
  if (names.length > 0) return names.join(", ");
  return formatLabel(track.artist?.name);
}

function albumArtist(album: Album): string {
  return formatLabel(album.artist?.name ?? album.artists?.[0]?.name);
}

function albumYear(album: Album): string {
  return album.releaseDate ? album.releaseDate.slice(0, 4) : "Unknown";
}

export function formatArtistLine(artist: Artist): string {
  const popularity =
    artist.popularity != null ? ` popularity ${artist.popularity}` : "";
  return `${formatLabel(artist.name)} [${formatId(artist.id)}]${popularity}`;
}

export function formatAlbumLine(album: Album): string {
  const version = album.version ? ` (${album.version})` : "";
  const count =
    album.numberOfTracks != null ? `, ${album.numberOfTracks} tracks` : "";
  return `${formatLabel(album.title)}${version} - ${albumArtist(album)} (${albumYear(album)}${count}) [${formatId(album.id)}]`;
}

export function formatPlaylistLine(playlist: Playlist): string {
  const count =
    playlist.numberOfTracks != null ? ` (${playlist.numberOfTracks} tracks)` : "";
  return `${formatLabel(playlist.title)}${count} [${formatId(playlist.uuid)}]`;
}

export function formatTrackLine(track: Track): string {
  const title = track.version
    ? `${formatLabel(track.title)} (${track.version})`
    : formatLabel(track.title);
  const album = track.album?.title ? ` (${track.album.title})` : "";
  return `${title} - ${trackArtist(track)}${album} [${formatDuration(track.duration)}] [${formatId(track.id)}]`;
}

function numbered<T>(items: T[], format: (item: T) => string): string[] {
  return items.map((item, index) => `  ${index + 1}. ${format(item)}`);
}

export function formatTracksAsText(heading: string, tracks: Track[]): string {
  return [`${heading}: ${tracks.length} tracks`, ...numbered(tracks, formatTrackLine)].join("\n");
}

export function formatArtistsAsText(heading: string, artists: Artist[]): string {
  return [`${heading}: ${artists.length} artists`, ...numbered(artists, formatArtistLine)].join("\n");
}

export function formatAlbumsAsText(heading: string, albums: Album[]): string {
  return [`${heading}: ${albums.length} albums`, ...numbered(albums, formatAlbumLine)].join("\n");
}

export function formatPlaylistsAsText(heading: string, playlists: Playlist[]): string {
  return [
    `${heading}: ${playlists.length} playlists`,
    ...numbered(playlists, formatPlaylistLine),
  ].join("\n");
}

export function formatSearchAsText(term: string, result: TidalSearch): string {
  const sections: string[] = [`Results for "${term}"`];
  const groups: Array<[string, string[]]> = [
    ["Artists", numbered(result.artists.items, formatArtistLine)],
    ["Albums", numbered(result.albums.items, formatAlbumLine)],
    ["Playlists", numbered(result.playlists.items, formatPlaylistLine)],
    ["Tracks", numbered(result.tracks.items, formatTrackLine)],
  ];
  for (const [label, lines] of groups) {
    if (lines.length === 0) continue;
    sections.push(`${label} (${lines.length}):`, ...lines);
  }
  if (sections.length === 1) {
    sections.push("  No matches.");
  }
  return sections.join("\n");
}

export function formatAsJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function formatAsIds(items: Array<{ id?: number | null | undefined }>): string {
  return items
    .filter((item) => item.id != null)
    .map((item) => String(item.id))
    .join("\n");
}
