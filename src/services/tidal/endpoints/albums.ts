import type { TidalClient } from "../client";
import {
  albumSchema,
  tidalItemsSchema,
  trackSchema,
  type Album,
  type Track,
} from "../models";

export class Albums {
  constructor(private readonly client: TidalClient) {}

  async get(id: string): Promise<Album> {
    const text = await this.client.get(`/albums/${encodeURIComponent(id)}`);
    return this.client.convertResult(text, albumSchema);
  }

  async search(term: string, limit?: number): Promise<Album[]> {
    const result = await this.client.search(term, limit);
    return result.albums.items;
  }

  async tracks(id: string): Promise<Track[]> {
    const text = await this.client.get(
      `/albums/${encodeURIComponent(id)}/tracks`
    );
    return this.client.convertResult(text, tidalItemsSchema(trackSchema)).items;
  }
}
