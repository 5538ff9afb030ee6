export interface Artist {
  id: string;
  name: string;
}

export interface Album {
  id: string;
  name: string;
  releaseDate?: string; // YYYY, YYYY-MM o YYYY-MM-DD según la precisión de Spotify
}

export interface Track {
  id: string;
  uri: string;
  title: string;
  artists: Artist[];
  album: Album;
  duration: number; // en milisegundos
  isrc?: string;
  explicit?: boolean;
  popularity?: number;
}
