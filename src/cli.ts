#!/usr/bin/env node

import { Command } from "commander";
import { registerAlbumCommand } from "./commands/album";
import { registerArtistCommand } from "./commands/artist";
import { registerAuthCommand } from "./commands/auth";
import { registerPlaylistCommand } from "./commands/playlist";
import { registerSearchCommand } from "./commands/search";
import { isClientError } from "./services/tidal/errors";

const program = new Command();

program
  .name("tonearm")
  .description("Browse and edit your TIDAL library from the terminal")
  .version("0.1.0");

registerAuthCommand(program);
registerSearchCommand(program);
registerArtistCommand(program);
registerAlbumCommand(program);
registerPlaylistCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  if (isClientError(error) && error.kind === "unauthorized") {
    console.error("The saved session was rejected. Run: tonearm auth login");
  }
  process.exitCode = 1;
});
