import type { TidalClient } from "../client";
import type { Track } from "../models";

export class Tracks {
  constructor(private readonly client: TidalClient) {}

  async search(term: string, limit?: number): Promise<Track[]> {
    const result = await this.client.search(term, limit);
    return result.tracks.items;
  }
}
