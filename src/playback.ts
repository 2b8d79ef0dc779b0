import type { EpisodeItem, PlaybackStateBody, PlaylistItem, SpotifyPlayerApi, TrackItem } from "./spotifyClient.js";
import type { NowPlaying, PlaybackControls, PlaybackState, PlaylistSummary, RepeatMode, TrackSummary } from "./types.js";

export const DEFAULT_SEARCH_LIMIT = 10;
export const DEFAULT_PLAYLIST_LIMIT = 50;

export interface SpotifyClientSource {
  client(): Promise<SpotifyPlayerApi>;
}

export function mapTrack(item: TrackItem | EpisodeItem): TrackSummary {
  if (item.type === "episode") {
    return {
      name: item.name,
      artists: [item.show.name],
      album: item.show.name,
      uri: item.uri,
      durationMs: item.duration_ms
    };
  }
  return {
    name: item.name,
    artists: item.artists.map((artist) => artist.name),
    album: item.album.name,
    uri: item.uri,
    durationMs: item.duration_ms
  };
}

export function mapPlaylist(playlist: PlaylistItem): PlaylistSummary {
  return {
    name: playlist.name,
    uri: playlist.uri,
    trackCount: playlist.tracks.total,
    owner: playlist.owner.display_name ?? playlist.owner.id
  };
}

function toRepeatMode(value: string): RepeatMode {
  return value === "track" || value === "context" ? value : "off";
}

export function mapPlaybackState(state: PlaybackStateBody | undefined): NowPlaying | null {
  if (!state || !state.item) {
    return null;
  }
  return {
    track: mapTrack(state.item),
    isPlaying: state.is_playing,
    progressMs: state.progress_ms ?? 0,
    shuffle: state.shuffle_state,
    repeat: toRepeatMode(state.repeat_state),
    device: state.device ? { name: state.device.name, volumePercent: state.device.volume_percent } : null
  };
}

export class SpotifyPlaybackControls implements PlaybackControls {
  constructor(private readonly session: SpotifyClientSource) {}

  async togglePlayback(): Promise<PlaybackState> {
    const api = await this.session.client();
    const { body } = await api.getMyCurrentPlaybackState();
    if (body?.is_playing) {
      await api.pause();
      return "paused";
    }
    await api.play();
    return "playing";
  }

  async skipNext(): Promise<void> {
    const api = await this.session.client();
    await api.skipToNext();
  }

  async skipPrevious(): Promise<void> {
    const api = await this.session.client();
    await api.skipToPrevious();
  }

  async search(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<TrackSummary[]> {
    const api = await this.session.client();
    const { body } = await api.searchTracks(query, { limit });
    return (body.tracks?.items ?? []).map(mapTrack);
  }

  async listPlaylists(limit = DEFAULT_PLAYLIST_LIMIT): Promise<PlaylistSummary[]> {
    const api = await this.session.client();
    const { body } = await api.getUserPlaylists({ limit });
    return body.items.map(mapPlaylist);
  }

  async nowPlaying(): Promise<NowPlaying | null> {
    const api = await this.session.client();
    const { body } = await api.getMyCurrentPlaybackState();
    return mapPlaybackState(body);
  }

  async setVolume(percent: number): Promise<void> {
    const api = await this.session.client();
    await api.setVolume(percent);
  }

  async playTracks(uris: string[]): Promise<void> {
    const api = await this.session.client();
    await api.play({ uris });
  }

  async playContext(contextUri: string): Promise<void> {
    const api = await this.session.client();
    await api.play({ context_uri: contextUri });
  }
}
