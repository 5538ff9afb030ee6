import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { Artist, Album, Track } from '../models/Track.js';
import type { CreatedPlaylist, PlaylistDetails } from '../models/Playlist.js';
import type {
  SpotifyUser,
  SpotifyTrack,
  SpotifyAlbum,
  SpotifyPaging,
  SpotifyArtistSearchResponse,
  SpotifyTopTracksResponse,
  SpotifyAlbumsResponse,
  SpotifyTracksResponse,
  SpotifyPlaylistResponse
} from '../models/SpotifyTypes.js';
import type { MusicCatalog } from './MusicCatalog.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  ManejadorErrores,
  CONFIGURACION_REINTENTO_PREDETERMINADA,
  type ConfiguracionReintento
} from '../utils/ErrorHandler.js';
import { ErrorLogger } from '../utils/ErrorLogger.js';

export interface SpotifyServiceOptions {
  adapter?: AxiosAdapter;
  reintentos?: ConfiguracionReintento;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Servicio para interactuar con la Web API de Spotify
 */
export class SpotifyService implements MusicCatalog {
  private client: AxiosInstance;
  private manejadorErrores: ManejadorErrores;

  constructor(accessToken: string, options: SpotifyServiceOptions = {}) {
    this.manejadorErrores = new ManejadorErrores(options.reintentos ?? CONFIGURACION_REINTENTO_PREDETERMINADA);
    this.client = axios.create({
      baseURL: 'https://api.spotify.com/v1',
      headers: {
        'Authorization': `Bearer ${accessToken}`,
        'Content-Type': 'application/json',
      },
      timeout: DEFAULT_CONFIG.REQUEST_TIMEOUT,
      adapter: options.adapter,
    });

    // Registrar los 4xx antes de que los clasifique ManejadorErrores
    this.client.interceptors.response.use(
      (response) => response,
      async (error: unknown) => {
        if (axios.isAxiosError(error)) {
          await ErrorLogger.logApiError(error, 'SpotifyService');
        }
        throw error;
      }
    );
  }

  /**
   * Obtener perfil del usuario actual
   */
  async getCurrentUser(): Promise<SpotifyUser> {
    return this.manejadorErrores.ejecutarConReintento(async () => {
      const response = await this.client.get<SpotifyUser>('/me');
      return response.data;
    }, 'getCurrentUser');
  }

  /**
   * Buscar un artista por nombre y devolver la primera coincidencia
   */
  async searchArtist(name: string): Promise<Artist | null> {
    const response = await this.manejadorErrores.ejecutarConReintento(async () => {
      return this.client.get<SpotifyArtistSearchResponse>('/search', {
        params: { q: `artist:${name}`, type: 'artist', limit: 1 }
      });
    }, 'searchArtist');

    const [artist] = response.data.artists.items;
    return artist ? { id: artist.id, name: artist.name } : null;
  }

  /**
   * Canciones más populares del artista, en el orden que devuelve Spotify
   */
  async getArtistTopTracks(artistId: string, market: string): Promise<Track[]> {
    const response = await this.manejadorErrores.ejecutarConReintento(async () => {
      return this.client.get<SpotifyTopTracksResponse>(`/artists/${encodeURIComponent(artistId)}/top-tracks`, {
        params: { market }
      });
    }, 'getArtistTopTracks');

    return response.data.tracks.map(track => this.convertSpotifyTrack(track));
  }

  /**
   * Todos los álbumes y singles del artista (paginado)
   */
  async getArtistAlbums(artistId: string): Promise<SpotifyAlbum[]> {
    const albums: SpotifyAlbum[] = [];
    const limit = DEFAULT_CONFIG.ALBUMS_PAGE_SIZE;
    let offset = 0;
    let hasNext = true;

    while (hasNext) {
      const response = await this.manejadorErrores.ejecutarConReintento(async () => {
        return this.client.get<SpotifyPaging<SpotifyAlbum>>(`/artists/${encodeURIComponent(artistId)}/albums`, {
          params: { include_groups: 'album,single', limit, offset }
        });
      }, 'getArtistAlbums');

      albums.push(...response.data.items);
      hasNext = Boolean(response.data.next);
      offset += limit;
    }

    return albums;
  }

  /**
   * IDs de las canciones de cada álbum, en lotes de 20 álbumes
   */
  async getAlbumTrackIds(albumIds: string[]): Promise<string[]> {
    const trackIds: string[] = [];

    for (const ids of chunk(albumIds, DEFAULT_CONFIG.ALBUMS_BATCH_SIZE)) {
      const response = await this.manejadorErrores.ejecutarConReintento(async () => {
        return this.client.get<SpotifyAlbumsResponse>('/albums', {
          params: { ids: ids.join(',') }
        });
      }, 'getAlbumTrackIds');

      for (const album of response.data.albums) {
        if (!album) continue;
        trackIds.push(...album.tracks.items.map(track => track.id));
      }
    }

    return trackIds;
  }

  /**
   * Detalle completo (con popularidad) de las canciones, en lotes de 50
   */
  async getTracks(trackIds: string[]): Promise<Track[]> {
    const tracks: Track[] = [];

    for (const ids of chunk(trackIds, DEFAULT_CONFIG.TRACKS_BATCH_SIZE)) {
      const response = await this.manejadorErrores.ejecutarConReintento(async () => {
        return this.client.get<SpotifyTracksResponse>('/tracks', {
          params: { ids: ids.join(',') }
        });
      }, 'getTracks');

      for (const track of response.data.tracks) {
        if (track) {
          tracks.push(this.convertSpotifyTrack(track));
        }
      }
    }

    return tracks;
  }

  /**
   * Discografía completa del artista: álbumes → IDs de canciones → detalle
   */
  async getArtistCatalogTracks(artistId: string, onProgress?: (message: string) => void): Promise<Track[]> {
    const albums = await this.getArtistAlbums(artistId);
    onProgress?.(`${albums.length} lanzamientos encontrados, recolectando canciones...`);

    const trackIds = await this.getAlbumTrackIds(albums.map(album => album.id));
    onProgress?.(`${trackIds.length} canciones encontradas, obteniendo popularidad...`);

    return this.getTracks(trackIds);
  }

  async createPlaylist(userId: string, details: PlaylistDetails): Promise<CreatedPlaylist> {
    const response = await this.manejadorErrores.ejecutarConReintento(async () => {
      return this.client.post<SpotifyPlaylistResponse>(`/users/${encodeURIComponent(userId)}/playlists`, {
        name: details.name,
        description: details.description,
        public: details.isPublic
      });
    }, 'createPlaylist');

    return {
      id: response.data.id,
      name: response.data.name,
      url: response.data.external_urls.spotify
    };
  }

  /**
   * Agregar canciones respetando el orden, en lotes de 100
   */
  async addTracksToPlaylist(playlistId: string, trackUris: string[]): Promise<void> {
    for (const uris of chunk(trackUris, DEFAULT_CONFIG.PLAYLIST_ADD_BATCH_SIZE)) {
      await this.manejadorErrores.ejecutarConReintento(async () => {
        return this.client.post(`/playlists/${encodeURIComponent(playlistId)}/tracks`, { uris });
      }, 'addTracksToPlaylist');
    }
  }

  /**
   * Convertir canción de Spotify al formato interno
   */
  private convertSpotifyTrack(spotifyTrack: SpotifyTrack): Track {
    const artists: Artist[] = spotifyTrack.artists.map(artist => ({
      id: artist.id,
      name: artist.name,
    }));

    const album: Album = {
      id: spotifyTrack.album.id,
      name: spotifyTrack.album.name,
      releaseDate: spotifyTrack.album.release_date,
    };

    return {
      id: spotifyTrack.id,
      uri: spotifyTrack.uri,
      title: spotifyTrack.name,
      artists,
      album,
      duration: spotifyTrack.duration_ms,
      isrc: spotifyTrack.external_ids?.isrc,
      explicit: spotifyTrack.explicit,
      popularity: spotifyTrack.popularity,
    };
  }
}
