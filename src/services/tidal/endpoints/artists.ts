import type { TidalClient } from "../client";
import {
  albumSchema,
  artistSchema,
  tidalItemsSchema,
  type Album,
  type Artist,
} from "../models";

export class Artists {
  constructor(private readonly client: TidalClient) {}

  async get(id: string): Promise<Artist> {
    const text = await this.client.get(`/artists/${encodeURIComponent(id)}`);
    return this.client.convertResult(text, artistSchema);
  }

  async search(term: string, limit?: number): Promise<Artist[]> {
    const result = await this.client.search(term, limit);
    return result.artists.items;
  }

  async albums(id: string): Promise<Album[]> {
    const text = await this.client.get(
      `/artists/${encodeURIComponent(id)}/albums`
    );
    return this.client.convertResult(text, tidalItemsSchema(albumSchema)).items;
  }
}
