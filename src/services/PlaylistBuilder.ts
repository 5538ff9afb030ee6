import type { MusicCatalog } from './MusicCatalog.js';
import type { Artist, Track } from '../models/Track.js';
import type { BuildRequest, BuildResult } from '../models/BuildResult.js';
import type { PlaylistDetails } from '../models/Playlist.js';
import type { StepReporter } from '../utils/ProgressReporter.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { ErrorArtistaNoEncontrado, ErrorSinCanciones } from '../utils/ErrorHandler.js';
import { rankCatalogTracks } from '../ranking/TrackScorer.js';

export function buildPlaylistDetails(artistName: string, topN: number, isPublic: boolean): PlaylistDetails {
  return {
    name: `Top ${topN} ${artistName}`,
    description: `Las ${topN} canciones más populares de ${artistName}`,
    isPublic
  };
}

/**
 * Arma la playlist del top N de un artista:
 * usuario → artista → canciones → playlist → agregar canciones.
 * Si el artista no existe o no hay canciones, falla antes de crear nada.
 */
export class PlaylistBuilder {
  constructor(
    private catalog: MusicCatalog,
    private reporter?: StepReporter,
    private now: () => Date = () => new Date()
  ) { }

  async build(request: BuildRequest): Promise<BuildResult> {
    const startTime = Date.now();

    const user = await this.step(
      'Obteniendo tu perfil de Spotify...',
      () => this.catalog.getCurrentUser(),
      (u) => `Sesión iniciada como ${u.display_name ?? u.id}`
    );

    const artist = await this.step(
      `Buscando artista: "${request.artistName}"...`,
      () => this.findArtist(request.artistName),
      (a) => `Artista encontrado: ${a.name} (ID: ${a.id})`
    );

    const tracks = await this.step(
      request.source === 'catalog'
        ? 'Recolectando la discografía completa...'
        : 'Obteniendo las canciones más populares...',
      () => this.selectTracks(artist, request, user.country ?? DEFAULT_CONFIG.DEFAULT_MARKET),
      (t) => `Top ${t.length} canciones seleccionadas`
    );

    // El nombre que escribió el usuario, igual que en la línea de comandos
    const details = buildPlaylistDetails(request.artistName, request.topN, request.isPublic);

    const playlist = await this.step(
      `Creando la playlist "${details.name}"...`,
      () => this.catalog.createPlaylist(user.id, details),
      (p) => `Playlist creada: ${p.name}`
    );

    await this.step(
      `Agregando ${tracks.length} canciones...`,
      () => this.catalog.addTracksToPlaylist(playlist.id, tracks.map(track => track.uri)),
      () => `${tracks.length} canciones agregadas`
    );

    return {
      artist,
      tracks,
      playlist,
      source: request.source,
      requested: request.topN,
      processingTime: Date.now() - startTime
    };
  }

  private async findArtist(name: string): Promise<Artist> {
    const artist = await this.catalog.searchArtist(name);
    if (!artist) {
      throw new ErrorArtistaNoEncontrado(name);
    }
    return artist;
  }

  private async selectTracks(artist: Artist, request: BuildRequest, market: string): Promise<Track[]> {
    let selected: Track[];

    if (request.source === 'catalog') {
      const catalogTracks = await this.catalog.getArtistCatalogTracks(
        artist.id,
        (message) => this.reporter?.updateStep(message)
      );
      selected = rankCatalogTracks(catalogTracks, request.topN, request.aggressiveness, this.now());
    } else {
      const topTracks = await this.catalog.getArtistTopTracks(artist.id, market);
      selected = topTracks.slice(0, request.topN);
    }

    if (selected.length === 0) {
      throw new ErrorSinCanciones(artist.name);
    }
    return selected;
  }

  private async step<T>(text: string, operation: () => Promise<T>, done: (value: T) => string): Promise<T> {
    this.reporter?.startStep(text);
    try {
      const value = await operation();
      this.reporter?.succeedStep(done(value));
      return value;
    } catch (error) {
      this.reporter?.failStep(`${text.replace(/\.\.\.$/, '')}: ${error instanceof Error ? error.message : 'Error desconocido'}`);
      throw error;
    }
  }
}
