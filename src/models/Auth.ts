export interface Credentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

/**
 * Token tal como queda guardado en el archivo de cache entre ejecuciones
 */
export interface StoredToken {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number; // epoch en milisegundos
  scope: string;
  tokenType: string;
}
