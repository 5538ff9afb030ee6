export interface SpotifyUser {
  id: string;
  display_name: string | null;
  country?: string;
}

export interface SpotifyArtist {
  id: string;
  name: string;
  external_urls?: {
    spotify: string;
  };
}

export interface SpotifyAlbum {
  id: string;
  name: string;
  release_date?: string;
}

export interface SpotifyTrack {
  id: string;
  uri: string;
  name: string;
  artists: SpotifyArtist[];
  album: SpotifyAlbum;
  duration_ms: number;
  external_ids?: {
    isrc?: string;
  };
  explicit?: boolean;
  popularity?: number;
}

export interface SpotifyPaging<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  next: string | null;
}

export interface SpotifyArtistSearchResponse {
  artists: SpotifyPaging<SpotifyArtist>;
}

export interface SpotifyTopTracksResponse {
  tracks: SpotifyTrack[];
}

export interface SpotifySimplifiedTrack {
  id: string;
  name: string;
}

export interface SpotifyAlbumDetails extends SpotifyAlbum {
  tracks: SpotifyPaging<SpotifySimplifiedTrack>;
}

export interface SpotifyAlbumsResponse {
  albums: Array<SpotifyAlbumDetails | null>;
}

export interface SpotifyTracksResponse {
  tracks: Array<SpotifyTrack | null>;
}

export interface SpotifyPlaylistResponse {
  id: string;
  name: string;
  external_urls: {
    spotify: string;
  };
}

export interface SpotifyTokenResponse {
  access_token: string;
  token_type: string;
  scope?: string;
  expires_in: number;
  refresh_token?: string;
}
