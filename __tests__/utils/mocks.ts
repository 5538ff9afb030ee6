// Shared test doubles: an in-process axios adapter and an in-memory catalog.

import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import type { MusicCatalog } from '../../src/services/MusicCatalog.js';
import type { Artist, Track } from '../../src/models/Track.js';
import type { CreatedPlaylist, PlaylistDetails } from '../../src/models/Playlist.js';
import type { SpotifyUser } from '../../src/models/SpotifyTypes.js';
import type { StepReporter } from '../../src/utils/ProgressReporter.js';
import type { ConfiguracionReintento } from '../../src/utils/ErrorHandler.js';

export interface Reply {
  status?: number;
  data: unknown;
  headers?: Record<string, string>;
}

export interface Route {
  method?: string;
  url: string | RegExp;
  reply: Reply | Reply[];
}

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  data: unknown;
  authorization: string;
}

export const NO_DELAY_RETRIES: ConfiguracionReintento = {
  maxReintentos: 3,
  retrasoBase: 1,
  retrasoMaximo: 1,
  multiplicadorRetroceso: 1,
  variacion: false
};

function matches(route: Route, method: string, url: string): boolean {
  if (route.method && route.method.toLowerCase() !== method) {
    return false;
  }
  return typeof route.url === 'string' ? route.url === url : route.url.test(url);
}

/**
 * Axios adapter that answers from a route table and records every request.
 * A route with several replies hands them out in order and repeats the last one.
 */
export function createMockAdapter(routes: Route[]): { adapter: AxiosAdapter; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const served = new Map<Route, number>();

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const method = (config.method ?? 'get').toLowerCase();
    const url = config.url ?? '';

    requests.push({
      method,
      url,
      params: config.params ?? {},
      data: typeof config.data === 'string' ? safeParse(config.data) : config.data,
      authorization: String(config.headers.get('Authorization') ?? '')
    });

    const route = routes.find(r => matches(r, method, url));
    const replies = route ? (Array.isArray(route.reply) ? route.reply : [route.reply]) : [];
    const count = route ? served.get(route) ?? 0 : 0;
    if (route) {
      served.set(route, count + 1);
    }
    const reply: Reply = replies[Math.min(count, replies.length - 1)] ?? { status: 404, data: { error: { status: 404, message: `No route for ${method.toUpperCase()} ${url}` } } };
    const status = reply.status ?? 200;

    const response: AxiosResponse = {
      data: reply.data,
      status,
      statusText: status < 400 ? 'OK' : 'Error',
      headers: reply.headers ?? {},
      config,
      request: {}
    };

    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, {}, response);
    }
    return response;
  };

  return { adapter, requests };
}

function safeParse(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

export function makeTrack(id: string, overrides: Partial<Track> = {}): Track {
  return {
    id,
    uri: `spotify:track:${id}`,
    title: `Song ${id}`,
    artists: [{ id: 'artist-1', name: 'Test Artist' }],
    album: { id: `album-${id}`, name: `Album ${id}`, releaseDate: '2020-01-01' },
    duration: 180000,
    popularity: 50,
    ...overrides
  };
}

export interface FakeCatalogData {
  user?: SpotifyUser;
  artist?: Artist | null;
  topTracks?: Track[];
  catalogTracks?: Track[];
}

/**
 * In-memory MusicCatalog that records the calls PlaylistBuilder makes
 */
export class FakeCatalog implements MusicCatalog {
  calls: string[] = [];
  topTracksMarket?: string;
  createdWith?: { userId: string; details: PlaylistDetails };
  addedUris: string[] = [];

  constructor(private data: FakeCatalogData = {}) {}

  async getCurrentUser(): Promise<SpotifyUser> {
    this.calls.push('getCurrentUser');
    return this.data.user ?? { id: 'test-user', display_name: 'Test User', country: 'AR' };
  }

  async searchArtist(name: string): Promise<Artist | null> {
    this.calls.push(`searchArtist:${name}`);
    return this.data.artist === undefined ? { id: 'artist-1', name: 'Test Artist' } : this.data.artist;
  }

  async getArtistTopTracks(artistId: string, market: string): Promise<Track[]> {
    this.calls.push(`getArtistTopTracks:${artistId}`);
    this.topTracksMarket = market;
    return this.data.topTracks ?? [];
  }

  async getArtistCatalogTracks(artistId: string, onProgress?: (message: string) => void): Promise<Track[]> {
    this.calls.push(`getArtistCatalogTracks:${artistId}`);
    onProgress?.('catalog loaded');
    return this.data.catalogTracks ?? [];
  }

  async createPlaylist(userId: string, details: PlaylistDetails): Promise<CreatedPlaylist> {
    this.calls.push('createPlaylist');
    this.createdWith = { userId, details };
    return { id: 'playlist-1', name: details.name, url: 'https://open.spotify.com/playlist/playlist-1' };
  }

  async addTracksToPlaylist(playlistId: string, trackUris: string[]): Promise<void> {
    this.calls.push(`addTracksToPlaylist:${playlistId}`);
    this.addedUris.push(...trackUris);
  }
}

export class RecordingReporter implements StepReporter {
  events: string[] = [];

  startStep(text: string): void {
    this.events.push(`start:${text}`);
  }

  updateStep(text: string): void {
    this.events.push(`update:${text}`);
  }

  succeedStep(text: string): void {
    this.events.push(`success:${text}`);
  }

  failStep(text: string): void {
    this.events.push(`fail:${text}`);
  }
}
