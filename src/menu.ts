import { z } from "zod";

import { classifyRemoteError, EndOfInputError, InvalidChoiceError } from "./errors.js";
import { formatNowPlaying, formatPlaylistTable, formatTrackTable } from "./format.js";
import { DEFAULT_SEARCH_LIMIT } from "./playback.js";
import type { Terminal } from "./terminal.js";
import type { PlaybackControls } from "./types.js";

export type MenuChoice =
  | "play-pause"
  | "next"
  | "previous"
  | "search"
  | "playlists"
  | "now-playing"
  | "volume"
  | "exit";

export interface MenuItem {
  key: string;
  choice: MenuChoice;
  label: string;
}

export const MENU_TITLE = "===== Spotify Terminal Player =====";

export const MENU_ITEMS: readonly MenuItem[] = [
  { key: "1", choice: "play-pause", label: "Play/Pause" },
  { key: "2", choice: "next", label: "Next Track" },
  { key: "3", choice: "previous", label: "Previous Track" },
  { key: "4", choice: "search", label: "Search Track" },
  { key: "5", choice: "playlists", label: "My Playlists" },
  { key: "6", choice: "now-playing", label: "Current Track Info" },
  { key: "7", choice: "volume", label: "Adjust Volume" },
  { key: "0", choice: "exit", label: "Exit" }
];

export const MENU_PROMPT = "Choose an option: ";

const volumeSchema = z
  .string()
  .trim()
  .regex(/^\d{1,3}$/)
  .transform(Number)
  .pipe(z.number().int().min(0).max(100));

export function renderMenu(): string {
  return [MENU_TITLE, ...MENU_ITEMS.map((item) => `${item.key}. ${item.label}`)].join("\n");
}

export function parseMenuChoice(input: string): MenuChoice {
  const key = input.trim();
  const item = MENU_ITEMS.find((candidate) => candidate.key === key);
  if (!item) {
    throw new InvalidChoiceError("Invalid option. Please try again.");
  }
  return item.choice;
}

export function parseVolume(input: string): number {
  const parsed = volumeSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidChoiceError("Invalid value. Volume must be between 0 and 100.");
  }
  return parsed.data;
}

/** Returns the zero-based index of the chosen entry, or null to go back. */
export function parseSelection(input: string, count: number): number | null {
  const value = input.trim();
  if (value === "" || value === "0") {
    return null;
  }
  const index = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(index) || index < 1 || index > count) {
    throw new InvalidChoiceError(`Invalid selection. Enter a number between 1 and ${count}, or 0 to go back.`);
  }
  return index - 1;
}

export class PlayerMenu {
  constructor(
    private readonly controls: PlaybackControls,
    private readonly terminal: Terminal,
    private readonly searchLimit = DEFAULT_SEARCH_LIMIT
  ) {}

  /** Runs until Exit or end of input and returns the process exit status. */
  async run(): Promise<number> {
    for (;;) {
      this.terminal.write(renderMenu());

      let choice: MenuChoice;
      try {
        choice = parseMenuChoice(await this.terminal.prompt(MENU_PROMPT));
      } catch (error) {
        if (error instanceof EndOfInputError) {
          return this.exit();
        }
        this.report(error);
        continue;
      }

      if (choice === "exit") {
        return this.exit();
      }

      try {
        await this.execute(choice);
      } catch (error) {
        if (error instanceof EndOfInputError) {
          return this.exit();
        }
        this.report(error);
      }
    }
  }

  private exit(): number {
    this.terminal.write("Exiting Spotify Terminal Player. Goodbye!");
    return 0;
  }

  private report(error: unknown): void {
    if (error instanceof InvalidChoiceError) {
      this.terminal.write(error.message);
      return;
    }
    this.terminal.write(`Error: ${classifyRemoteError(error).message}`);
  }

  private async execute(choice: Exclude<MenuChoice, "exit">): Promise<void> {
    switch (choice) {
      case "play-pause": {
        const state = await this.controls.togglePlayback();
        this.terminal.write(state === "playing" ? "Playback started" : "Playback paused");
        return;
      }
      case "next":
        await this.controls.skipNext();
        this.terminal.write("Skipped to next track");
        return;
      case "previous":
        await this.controls.skipPrevious();
        this.terminal.write("Returned to previous track");
        return;
      case "search":
        return this.searchAndPlay();
      case "playlists":
        return this.choosePlaylist();
      case "now-playing": {
        const nowPlaying = await this.controls.nowPlaying();
        this.terminal.write(nowPlaying ? formatNowPlaying(nowPlaying) : "No track currently playing.");
        return;
      }
      case "volume": {
        const level = parseVolume(await this.terminal.prompt("Enter new volume (0-100): "));
        await this.controls.setVolume(level);
        this.terminal.write(`Volume adjusted to ${level}%`);
        return;
      }
    }
  }

  private async searchAndPlay(): Promise<void> {
    const query = (await this.terminal.prompt("Enter track name or artist: ")).trim();
    if (!query) {
      this.terminal.write("Search cancelled.");
      return;
    }

    const tracks = await this.controls.search(query, this.searchLimit);
    if (tracks.length === 0) {
      this.terminal.write("No tracks found.");
      return;
    }

    this.terminal.write(formatTrackTable(query, tracks));
    const index = parseSelection(
      await this.terminal.prompt(`Choose a track to play (1-${tracks.length}) or 0 to go back: `),
      tracks.length
    );
    if (index === null) {
      return;
    }

    const track = tracks[index];
    await this.controls.playTracks([track.uri]);
    this.terminal.write(`Now playing: ${track.name}`);
  }

  private async choosePlaylist(): Promise<void> {
    const playlists = await this.controls.listPlaylists();
    if (playlists.length === 0) {
      this.terminal.write("No playlists found.");
      return;
    }

    this.terminal.write(formatPlaylistTable(playlists));
    const index = parseSelection(
      await this.terminal.prompt(`Choose a playlist to play (1-${playlists.length}) or 0 to go back: `),
      playlists.length
    );
    if (index === null) {
      return;
    }

    const playlist = playlists[index];
    await this.controls.playContext(playlist.uri);
    this.terminal.write(`Now playing playlist: ${playlist.name}`);
  }
}
