export * from "./client";
export * from "./credentials";
export * from "./decode";
export * from "./errors";
export * from "./models";
export { Albums } from "./endpoints/albums";
export { Artists } from "./endpoints/artists";
export { Playlists, type PlaylistChanges } from "./endpoints/playlists";
export { Search } from "./endpoints/search";
export { Tracks } from "./endpoints/tracks";
