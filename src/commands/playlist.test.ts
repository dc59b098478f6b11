import { describe, expect, it, vi } from "vitest";
import playlistJson from "../test/fixtures/playlist.json";
import playlistTracksJson from "../test/fixtures/playlist_tracks.json";
import userPlaylistsJson from "../test/fixtures/user_playlists.json";
import { createTestClient, jsonResponse, textResponse } from "../test/mocks/tidal-api";
import {
  parseTrackIds,
  runPlaylistAdd,
  runPlaylistList,
  runPlaylistShow,
  runPlaylistTracks,
  runPlaylistUpdate,
} from "./playlist";

const PLAYLIST_ID = "7ce7df87-6d37-4465-80db-84535a4e44a4";

describe("parseTrackIds", () => {
  it("accepts separate and comma-joined ids", () => {
    expect(parseTrackIds(["1", "2,3", " 4 ,"])).toEqual([1, 2, 3, 4]);
  });

  it("rejects anything that is not a positive integer", () => {
    expect(() => parseTrackIds(["12", "abc"])).toThrow("Invalid track id: abc");
    expect(() => parseTrackIds(["-5"])).toThrow("Invalid track id: -5");
  });
});

describe("playlist commands", () => {
  it("shows a playlist with its description", async () => {
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    const { client } = createTestClient({
      [`GET /playlists/${PLAYLIST_ID}`]: () => jsonResponse(playlistJson),
    });

    await runPlaylistShow(PLAYLIST_ID, {}, client);

    expect(stdout).toHaveBeenCalledWith(
      `Late Night Drive (2 tracks) [${PLAYLIST_ID}]\n  Slow songs for empty roads`
    );
  });

  it("prints track ids one per line", async () => {
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    const { client } = createTestClient({
      [`GET /playlists/${PLAYLIST_ID}/tracks`]: () =>
        jsonResponse(playlistTracksJson),
    });

    await runPlaylistTracks(PLAYLIST_ID, { format: "ids" }, client);

    expect(stdout.mock.calls).toEqual([["80121212"]]);
  });

  it("lists the user's playlists", async () => {
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    const { client } = createTestClient({
      "GET /users/1234/playlists": () => jsonResponse(userPlaylistsJson),
    });

    await runPlaylistList({}, client);

    expect(stdout).toHaveBeenCalledWith(
      [
        "Your playlists: 2 playlists",
        "  1. roadtrip (24 tracks) [8edf5a89-fec4-4aa3-80ab-9e00a83633a2]",
        "  2. focus (7 tracks) [1f2e3d4c-5b6a-4798-8a9b-0c1d2e3f4a5b]",
      ].join("\n")
    );
  });

  it("adds tracks and reports the re-read playlist", async () => {
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    const { client, requests } = createTestClient({
      [`GET /playlists/${PLAYLIST_ID}/items`]: () =>
        jsonResponse({ items: [] }, { headers: { ETag: "123457689" } }),
      [`POST /playlists/${PLAYLIST_ID}/items`]: () => textResponse("{}"),
      [`GET /playlists/${PLAYLIST_ID}`]: () => jsonResponse(playlistJson),
    });

    await runPlaylistAdd(PLAYLIST_ID, ["79914999,79915000"], {}, client);

    expect(new URLSearchParams(requests[1]?.body ?? "").get("trackIds")).toBe(
      "79914999,79915000"
    );
    expect(stdout).toHaveBeenCalledWith(
      `Added 2 tracks to Late Night Drive (2 tracks) [${PLAYLIST_ID}]`
    );
  });

  it("refuses an add without track ids", async () => {
    const { client, requests } = createTestClient({});

    await expect(runPlaylistAdd(PLAYLIST_ID, [","], {}, client)).rejects.toThrow(
      "No track ids given."
    );
    expect(requests).toHaveLength(0);
  });

  it("updates the title and prints the playlist as JSON", async () => {
    const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    const { client, requests } = createTestClient({
      "GET /playlists/p": () =>
        jsonResponse({ uuid: "p", title: "renamed" }, { headers: { ETag: "3" } }),
      "POST /playlists/p": () => textResponse(""),
    });

    await runPlaylistUpdate("p", { title: "renamed", format: "json" }, client);

    expect(requests[1]?.body).toBe("title=renamed");
    expect(stdout).toHaveBeenCalledWith('{\n  "uuid": "p",\n  "title": "renamed"\n}');
  });
});
