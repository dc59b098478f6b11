import type { TidalClient } from "../client";
import type { TidalSearch } from "../models";

export class Search {
  constructor(private readonly client: TidalClient) {}

  /** Artists, albums, playlists and tracks matching `term`, `limit` per kind. */
  find(term: string, limit?: number): Promise<TidalSearch> {
    return this.client.search(term, limit);
  }
}
