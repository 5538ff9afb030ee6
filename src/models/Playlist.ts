export interface PlaylistDetails {
  name: string;
  description: string;
  isPublic: boolean;
}

export interface CreatedPlaylist {
  id: string;
  name: string;
  url: string;
}
