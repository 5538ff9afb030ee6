/**
 * Configuración por defecto para el CLI
 */
export const DEFAULT_CONFIG = {
  // Permisos pedidos en la autorización del usuario
  SCOPES: ['user-read-private', 'playlist-modify-public', 'playlist-modify-private'],

  // Timeouts
  REQUEST_TIMEOUT: 10000,
  OAUTH_TIMEOUT: 120000,

  // Margen antes de considerar vencido un token guardado
  TOKEN_EXPIRY_MARGIN: 60 * 1000,

  // Tamaños de lote que acepta la Web API
  ALBUMS_PAGE_SIZE: 50,
  ALBUMS_BATCH_SIZE: 20,
  TRACKS_BATCH_SIZE: 50,
  PLAYLIST_ADD_BATCH_SIZE: 100,

  // Mercado si el perfil del usuario no trae país
  DEFAULT_MARKET: 'US',

  DEFAULT_AGGRESSIVENESS: 1,
  DEFAULT_SOURCE: 'top-tracks',

  REDIRECT_URI: 'http://127.0.0.1:8888/callback',
  ENV_FILE: '.env'
} as const;

export const ENV_VARS = {
  CLIENT_ID: 'SPOTIFY_CLIENT_ID',
  CLIENT_SECRET: 'SPOTIFY_CLIENT_SECRET',
  REDIRECT_URI: 'SPOTIFY_REDIRECT_URI'
} as const;

/**
 * Mensajes de ayuda y información
 */
export const HELP_MESSAGES = {
  WELCOME: '🎵 Top N de Spotify',
  DESCRIPTION: 'Crea una playlist con las canciones más populares de un artista',

  CREDENTIALS_MISSING: `
Para obtener las credenciales:

1. Visitá https://developer.spotify.com/dashboard y creá una aplicación
2. Copiá el Client ID y el Client Secret
3. Agregá esta Redirect URI en la configuración de la aplicación:
   http://127.0.0.1:8888/callback
4. Completá el archivo .env con esos valores:

SPOTIFY_CLIENT_ID=tu_client_id
SPOTIFY_CLIENT_SECRET=tu_client_secret
SPOTIFY_REDIRECT_URI=http://127.0.0.1:8888/callback
`
} as const;
