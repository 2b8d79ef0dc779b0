import stringWidth from "string-width";

import type { NowPlaying, PlaylistSummary, RepeatMode, TrackSummary } from "./types.js";

const COLUMN_GAP = "  ";

const REPEAT_LABELS: Record<RepeatMode, string> = {
  off: "Off",
  track: "Track",
  context: "Playlist/Album"
};

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, "0")}`;
}

export function renderTable(title: string, headers: string[], rows: string[][]): string {
  // Columns are sized in terminal cells so wide (CJK, emoji) names stay aligned.
  const widths = headers.map((header, column) =>
    Math.max(stringWidth(header), ...rows.map((row) => stringWidth(row[column] ?? "")))
  );
  const pad = (cell: string, width: number) => cell + " ".repeat(Math.max(0, width - stringWidth(cell)));
  const renderRow = (cells: string[]) =>
    widths
      .map((width, column) => pad(cells[column] ?? "", width))
      .join(COLUMN_GAP)
      .trimEnd();

  return [title, renderRow(headers), ...rows.map(renderRow)].join("\n");
}

export function formatTrackTable(query: string, tracks: TrackSummary[]): string {
  return renderTable(
    `Results for '${query}'`,
    ["#", "Name", "Artist", "Album"],
    tracks.map((track, index) => [String(index + 1), track.name, track.artists.join(", "), track.album])
  );
}

export function formatPlaylistTable(playlists: PlaylistSummary[]): string {
  return renderTable(
    "Your Playlists",
    ["#", "Name", "Tracks"],
    playlists.map((playlist, index) => [String(index + 1), playlist.name, String(playlist.trackCount)])
  );
}

export function formatNowPlaying(nowPlaying: NowPlaying): string {
  const { track } = nowPlaying;
  const percent = track.durationMs > 0 ? (nowPlaying.progressMs / track.durationMs) * 100 : 0;
  const lines = [
    "Now Playing:",
    `Track: ${track.name}`,
    `Artist: ${track.artists.join(", ")}`,
    `Album: ${track.album}`,
    `Progress: ${formatDuration(nowPlaying.progressMs)}/${formatDuration(track.durationMs)} (${percent.toFixed(1)}%)`,
    `Shuffle: ${nowPlaying.shuffle ? "On" : "Off"}`,
    `Repeat: ${REPEAT_LABELS[nowPlaying.repeat]}`
  ];
  if (nowPlaying.device) {
    const volume = nowPlaying.device.volumePercent === null ? "volume unknown" : `volume ${nowPlaying.device.volumePercent}%`;
    lines.push(`Device: ${nowPlaying.device.name} (${volume})`);
  }
  return lines.join("\n");
}
