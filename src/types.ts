export interface TrackSummary {
  name: string;
  artists: string[];
  album: string;
  uri: string;
  durationMs: number;
}

export interface PlaylistSummary {
  name: string;
  uri: string;
  trackCount: number;
  owner: string;
}

export type RepeatMode = "off" | "track" | "context";

export interface DeviceSummary {
  name: string;
  volumePercent: number | null;
}

export interface NowPlaying {
  track: TrackSummary;
  isPlaying: boolean;
  progressMs: number;
  shuffle: boolean;
  repeat: RepeatMode;
  device: DeviceSummary | null;
}

export type PlaybackState = "playing" | "paused";

/**
 * Everything the menu needs from the remote player. The Spotify-backed
 * implementation lives in playback.ts; tests substitute their own.
 */
export interface PlaybackControls {
  togglePlayback(): Promise<PlaybackState>;
  skipNext(): Promise<void>;
  skipPrevious(): Promise<void>;
  search(query: string, limit?: number): Promise<TrackSummary[]>;
  listPlaylists(limit?: number): Promise<PlaylistSummary[]>;
  nowPlaying(): Promise<NowPlaying | null>;
  setVolume(percent: number): Promise<void>;
  playTracks(uris: string[]): Promise<void>;
  playContext(contextUri: string): Promise<void>;
}
