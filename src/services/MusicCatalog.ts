import type { Artist, Track } from '../models/Track.js';
import type { CreatedPlaylist, PlaylistDetails } from '../models/Playlist.js';
import type { SpotifyUser } from '../models/SpotifyTypes.js';

/**
 * Operaciones del catálogo que usa PlaylistBuilder. SpotifyService es la
 * implementación real; los tests usan una en memoria.
 */
export interface MusicCatalog {
  getCurrentUser(): Promise<SpotifyUser>;
  searchArtist(name: string): Promise<Artist | null>;
  getArtistTopTracks(artistId: string, market: string): Promise<Track[]>;
  getArtistCatalogTracks(artistId: string, onProgress?: (message: string) => void): Promise<Track[]>;
  createPlaylist(userId: string, details: PlaylistDetails): Promise<CreatedPlaylist>;
  addTracksToPlaylist(playlistId: string, trackUris: string[]): Promise<void>;
}
