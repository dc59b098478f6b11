import { z } from "zod";

// The v1 API omits or nulls fields depending on context, so every field is
// optional and nullable. An embedded artist or album is a copy, not a reference.
// Enums are closed: a value outside them fails the whole response, including
// the other collections of a search.

export const modelTypeSchema = z.enum([
  "ALBUM",
  "ARTIST",
  "EDITORIAL",
  "MAIN",
  "USER",
  "PODCAST",
  "CONTRIBUTOR",
  "FEATURED",
]);

export const audioModeSchema = z.enum([
  "MONO",
  "STEREO",
  "SONY_360RA",
  "DOLBY_ATMOS",
]);

// HI_RES is what the web player labels "Master"
export const audioQualitySchema = z.enum(["LOSSLESS", "HI_RES", "HIGH", "LOW"]);

export const artistTypeSchema = z.enum(["ARTIST", "CONTRIBUTOR"]);

export const albumTypeSchema = z.enum(["ALBUM", "EP", "SINGLE"]);

export type ModelType = z.infer<typeof modelTypeSchema>;
export type AudioMode = z.infer<typeof audioModeSchema>;
export type AudioQuality = z.infer<typeof audioQualitySchema>;
export type ArtistType = z.infer<typeof artistTypeSchema>;
export type AlbumType = z.infer<typeof albumTypeSchema>;

const int = () => z.number().int().nullish();
const text = () => z.string().nullish();
const flag = () => z.boolean().nullish();

export const artistSchema = z.object({
  id: int(),
  name: text(),
  artistTypes: z.array(artistTypeSchema).nullish(),
  url: text(),
  picture: text(),
  popularity: int(),
  type: modelTypeSchema.nullish(),
});

export const albumSchema = z.object({
  id: int(),
  title: text(),
  duration: int(),
  streamReady: flag(),
  streamStartDate: text(),
  allowStreaming: flag(),
  premiumStreamingOnly: flag(),
  numberOfTracks: int(),
  numberOfVideos: int(),
  numberOfVolumes: int(),
  releaseDate: text(),
  copyright: text(),
  version: text(),
  url: text(),
  cover: text(),
  videoCover: text(),
  explicit: flag(),
  upc: text(),
  popularity: int(),
  audioQuality: audioQualitySchema.nullish(),
  audioModes: z.array(audioModeSchema).nullish(),
  artist: artistSchema.nullish(),
  artists: z.array(artistSchema).nullish(),
  type: albumTypeSchema.nullish(),
});

export const playlistSchema = z.object({
  uuid: text(),
  title: text(),
  numberOfTracks: int(),
  numberOfVideos: int(),
  description: text(),
  duration: int(),
  lastUpdated: text(),
  created: text(),
  type: modelTypeSchema.nullish(),
  publicPlaylist: flag(),
  url: text(),
  image: text(),
  popularity: int(),
  squareImage: text(),
  promotedArtists: z.array(artistSchema).nullish(),
  lastItemAddedAt: text(),
});

export const trackSchema = z.object({
  id: int(),
  title: text(),
  duration: int(),
  replayGain: z.number().nullish(),
  peak: z.number().nullish(),
  allowStreaming: flag(),
  streamReady: flag(),
  streamStartDate: text(),
  premiumStreamingOnly: flag(),
  trackNumber: int(),
  volumeNumber: int(),
  version: text(),
  popularity: int(),
  copyright: text(),
  url: text(),
  isrc: text(),
  editable: flag(),
  explicit: flag(),
  audioQuality: audioQualitySchema.nullish(),
  audioModes: z.array(audioModeSchema).nullish(),
  artist: artistSchema.nullish(),
  artists: z.array(artistSchema).nullish(),
  album: albumSchema.nullish(),
});

export type Artist = z.infer<typeof artistSchema>;
export type Album = z.infer<typeof albumSchema>;
export type Playlist = z.infer<typeof playlistSchema>;
export type Track = z.infer<typeof trackSchema>;

/** The `{ items: [...] }` envelope every list endpoint answers with. */
export function tidalItemsSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({ items: z.array(item) });
}

export type TidalItems<T> = { items: T[] };

const emptyItems = () => ({ items: [] });

// Each collection is filled independently: ten artists and zero tracks is a
// valid answer, and so is a response that leaves a collection out.
export const searchSchema = z.object({
  artists: tidalItemsSchema(artistSchema).default(emptyItems),
  albums: tidalItemsSchema(albumSchema).default(emptyItems),
  playlists: tidalItemsSchema(playlistSchema).default(emptyItems),
  tracks: tidalItemsSchema(trackSchema).default(emptyItems),
});

export type TidalSearch = z.infer<typeof searchSchema>;
