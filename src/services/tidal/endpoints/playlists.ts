import type { FormPayload, TidalClient } from "../client";
import {
  playlistSchema,
  tidalItemsSchema,
  trackSchema,
  type Playlist,
  type Track,
} from "../models";

export type PlaylistChanges = {
  title?: string | undefined;
  description?: string | undefined;
};

function playlistPath(id: string): string {
  return `/playlists/${encodeURIComponent(id)}`;
}

function joinTrackIds(tracks: Track[]): string {
  return tracks
    .map((track) => {
      if (track.id == null) {
        throw new Error("Every track added to a playlist needs an id");
      }
      return String(track.id);
    })
    .join(",");
}

export class Playlists {
  constructor(private readonly client: TidalClient) {}

  async get(id: string): Promise<Playlist> {
    const text = await this.client.get(playlistPath(id));
    return this.client.convertResult(text, playlistSchema);
  }

  async search(term: string, limit?: number): Promise<Playlist[]> {
    const result = await this.client.search(term, limit);
    return result.playlists.items;
  }

  async tracks(id: string): Promise<Track[]> {
    const text = await this.client.get(`${playlistPath(id)}/tracks`);
    return this.client.convertResult(text, tidalItemsSchema(trackSchema)).items;
  }

  async userPlaylists(): Promise<Playlist[]> {
    const text = await this.client.get(
      `/users/${this.client.userId()}/playlists`
    );
    return this.client.convertResult(text, tidalItemsSchema(playlistSchema))
      .items;
  }

  async create(title: string, description: string): Promise<Playlist> {
    const text = await this.client.post(
      `/users/${this.client.userId()}/playlists`,
      { title, description }
    );
    return this.client.convertResult(text, playlistSchema);
  }

  /**
   * Append tracks under the playlist's current etag. If the playlist changed
   * since the etag was read the service rejects the write and the classified
   * error is passed on; nothing is retried. With `addDupes` false the service
   * refuses tracks already in the playlist.
   *
   * Returns the playlist as re-read after the write.
   */
  async addTracks(
    id: string,
    tracks: Track[],
    addDupes: boolean
  ): Promise<Playlist> {
    const itemsPath = `${playlistPath(id)}/items`;
    const form: FormPayload = {
      trackIds: joinTrackIds(tracks),
      onDupes: addDupes ? "ADD" : "FAIL",
    };

    const etag = await this.client.etag(itemsPath);
    await this.client.post(itemsPath, form, etag);
    return this.get(id);
  }

  /** Rename or re-describe a playlist, guarded by its etag like `addTracks`. */
  async update(id: string, changes: PlaylistChanges): Promise<Playlist> {
    const form: FormPayload = {};
    if (changes.title !== undefined) form.title = changes.title;
    if (changes.description !== undefined) {
      form.description = changes.description;
    }
    if (Object.keys(form).length === 0) {
      throw new Error("Nothing to update: pass a title or a description");
    }

    const etag = await this.client.etag(playlistPath(id));
    await this.client.post(playlistPath(id), form, etag);
    return this.get(id);
  }
}
