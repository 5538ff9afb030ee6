import type { Artist, Track } from './Track.js';
import type { CreatedPlaylist } from './Playlist.js';

export type TrackSource = 'top-tracks' | 'catalog';

export type AggressivenessLevel = 0 | 1 | 2 | 3;

export interface BuildRequest {
  artistName: string;
  topN: number;
  source: TrackSource;
  aggressiveness: AggressivenessLevel;
  isPublic: boolean;
}

export interface BuildResult {
  artist: Artist;
  tracks: Track[];
  playlist: CreatedPlaylist;
  source: TrackSource;
  requested: number;
  processingTime: number;
}
