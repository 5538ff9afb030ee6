import axios, { AxiosError } from 'axios';


export class ErrorTopTracks extends Error {
  constructor(
    mensaje: string,
    public readonly codigo: string,
    public readonly errorOriginal?: Error,
    public readonly reintentar: boolean = false
  ) {
    super(mensaje);
    this.name = 'ErrorTopTracks';
  }
}

export class ErrorAutenticacion extends ErrorTopTracks {
  constructor(mensaje: string, errorOriginal?: Error) {
    super(mensaje, 'ERROR_AUTH', errorOriginal, false);
    this.name = 'ErrorAutenticacion';
  }
}

export class ErrorLimiteVelocidad extends ErrorTopTracks {
  constructor(
    mensaje: string,
    public readonly reintentarDespues: number,
    errorOriginal?: Error
  ) {
    super(mensaje, 'LIMITE_VELOCIDAD', errorOriginal, true);
    this.name = 'ErrorLimiteVelocidad';
  }
}

export class ErrorRed extends ErrorTopTracks {
  constructor(mensaje: string, errorOriginal?: Error) {
    super(mensaje, 'ERROR_RED', errorOriginal, true);
    this.name = 'ErrorRed';
  }
}

export class ErrorServicioNoDisponible extends ErrorTopTracks {
  constructor(mensaje: string, errorOriginal?: Error) {
    super(mensaje, 'SERVICIO_NO_DISPONIBLE', errorOriginal, true);
    this.name = 'ErrorServicioNoDisponible';
  }
}

export class ErrorConfiguracion extends ErrorTopTracks {
  constructor(mensaje: string) {
    super(mensaje, 'ERROR_CONFIGURACION');
    this.name = 'ErrorConfiguracion';
  }
}

export class ErrorArtistaNoEncontrado extends ErrorTopTracks {
  constructor(public readonly artista: string) {
    super(`No se encontró el artista "${artista}"`, 'ARTISTA_NO_ENCONTRADO');
    this.name = 'ErrorArtistaNoEncontrado';
  }
}

export class ErrorSinCanciones extends ErrorTopTracks {
  constructor(public readonly artista: string) {
    super(`No se encontraron canciones populares de "${artista}"`, 'SIN_CANCIONES');
    this.name = 'ErrorSinCanciones';
  }
}

export interface ConfiguracionReintento {
  maxReintentos: number;
  retrasoBase: number;
  retrasoMaximo: number;
  multiplicadorRetroceso: number;
  variacion: boolean;
}


export const CONFIGURACION_REINTENTO_PREDETERMINADA: ConfiguracionReintento = {
  maxReintentos: 3,
  retrasoBase: 1000, // 1 segundo
  retrasoMaximo: 30000, // 30 segundos
  multiplicadorRetroceso: 2,
  variacion: true
};

/**
 * Cuerpo de error de Spotify. La Web API devuelve `{ error: { status, message } }`
 * y el endpoint de tokens `{ error, error_description }`.
 */
interface CuerpoErrorSpotify {
  error?: string | { message?: string };
  error_description?: string;
}

const CODIGOS_OAUTH_INVALIDOS = ['invalid_client', 'invalid_request', 'invalid_grant', 'unsupported_grant_type'];


export class ManejadorErrores {
  constructor(private configuracion: ConfiguracionReintento = CONFIGURACION_REINTENTO_PREDETERMINADA) {}


  clasificarError(error: unknown): ErrorTopTracks {
    if (error instanceof ErrorTopTracks) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      return this.clasificarErrorAxios(error);
    }

    if (error instanceof Error) {
      // Verificar códigos de error de red comunes
      if (this.esErrorRed(error)) {
        return new ErrorRed(
          `Error de red: ${error.message}`,
          error
        );
      }

      return new ErrorTopTracks(
        error.message,
        'ERROR_DESCONOCIDO',
        error,
        false
      );
    }

    return new ErrorTopTracks(
      'Ocurrió un error desconocido',
      'ERROR_DESCONOCIDO',
      undefined,
      false
    );
  }


  private clasificarErrorAxios(error: AxiosError): ErrorTopTracks {
    // Sin respuesta - error de red
    if (!error.response) {
      return new ErrorRed(
        `Error de red: ${error.message}`,
        error
      );
    }

    const estado = error.response.status;
    const textoEstado = error.response.statusText || '';
    const cuerpo = this.leerCuerpoError(error.response.data);
    const tipoError = typeof cuerpo.error === 'string' ? cuerpo.error : undefined;
    const detalle = this.obtenerDetalle(cuerpo);

    if (estado === 429) {
      const reintentarDespues = this.obtenerRetrasoReintentarDespues(error);
      return new ErrorLimiteVelocidad(
        `Límite de velocidad alcanzado en Spotify. Reintentar después de ${reintentarDespues}ms`,
        reintentarDespues,
        error
      );
    }

    if (estado === 401) {
      return new ErrorAutenticacion(detalle || 'Autenticación fallida - credenciales inválidas o expiradas', error);
    }

    if (estado === 403) {
      return new ErrorAutenticacion(detalle || 'Acceso prohibido - permisos insuficientes', error);
    }

    if (estado === 400 && tipoError && CODIGOS_OAUTH_INVALIDOS.includes(tipoError)) {
      return new ErrorAutenticacion(detalle || 'Credenciales de cliente inválidas', error);
    }

    // Errores del servidor (5xx)
    if (estado >= 500) {
      return new ErrorServicioNoDisponible(
        `Servicio Spotify no disponible (${estado}): ${textoEstado}`,
        error
      );
    }

    // Errores del cliente (4xx)
    if (estado >= 400) {
      return new ErrorTopTracks(
        detalle || `Error del cliente (${estado}): ${textoEstado}`,
        `ERROR_CLIENTE_${estado}`,
        error,
        false
      );
    }

    return new ErrorTopTracks(
      `Error HTTP (${estado}): ${textoEstado}`,
      `ERROR_HTTP_${estado}`,
      error,
      false
    );
  }

  /**
   * Ejecutar una operación con lógica de reintento y retroceso exponencial
   */
  async ejecutarConReintento<T>(
    operacion: () => Promise<T>,
    nombreOperacion?: string
  ): Promise<T> {
    let ultimoError: ErrorTopTracks | undefined;

    for (let intento = 1; intento <= this.configuracion.maxReintentos; intento++) {
      try {
        return await operacion();
      } catch (error) {
        ultimoError = this.clasificarError(error);

        // No reintentar errores no reintentables
        if (!ultimoError.reintentar) {
          throw ultimoError;
        }

        // No reintentar en el último intento
        if (intento === this.configuracion.maxReintentos) {
          break;
        }

        const retraso = ultimoError instanceof ErrorLimiteVelocidad
          ? ultimoError.reintentarDespues
          : this.calcularRetrasoRetroceso(intento);

        const descripcionOperacion = nombreOperacion ? ` para ${nombreOperacion}` : '';
        console.warn(
          `${ultimoError.name}${descripcionOperacion}. Reintentando en ${retraso}ms (intento ${intento}/${this.configuracion.maxReintentos}): ${ultimoError.message}`
        );

        await this.dormir(retraso);
      }
    }

    const descripcionOperacion = nombreOperacion ? ` para ${nombreOperacion}` : '';
    if (!ultimoError) {
      throw new ErrorTopTracks(
        `Falló después de ${this.configuracion.maxReintentos} intentos${descripcionOperacion}. No hay detalles de error disponibles.`,
        'ERROR_DESCONOCIDO',
        undefined,
        false
      );
    }

    throw new ErrorTopTracks(
      `Falló después de ${this.configuracion.maxReintentos} intentos${descripcionOperacion}. Último error: ${ultimoError.message}`,
      ultimoError.codigo,
      ultimoError,
      false
    );
  }

  /**
   * Calcular retraso de retroceso exponencial con variación opcional
   */
  private calcularRetrasoRetroceso(intento: number): number {
    let retraso = this.configuracion.retrasoBase * Math.pow(this.configuracion.multiplicadorRetroceso, intento - 1);

    retraso = Math.min(retraso, this.configuracion.retrasoMaximo);

    // Variación para no reintentar todos a la vez
    if (this.configuracion.variacion) {
      retraso = retraso * (0.5 + Math.random() * 0.5);
    }

    return Math.floor(retraso);
  }

  /**
   * Obtener retraso de reintento desde el header Retry-After
   */
  private obtenerRetrasoReintentarDespues(error: AxiosError): number {
    const reintentarDespues = error.response?.headers['retry-after'];

    if (reintentarDespues !== undefined && reintentarDespues !== null) {
      const segundos = parseInt(String(reintentarDespues), 10);
      if (!isNaN(segundos)) {
        return segundos * 1000;
      }
    }

    // Por defecto 5 segundos si no viene el header
    return 5000;
  }

  private leerCuerpoError(data: unknown): CuerpoErrorSpotify {
    if (typeof data !== 'object' || data === null) {
      return {};
    }

    const cuerpo: CuerpoErrorSpotify = {};
    if ('error_description' in data && typeof data.error_description === 'string') {
      cuerpo.error_description = data.error_description;
    }
    if ('error' in data) {
      const error = data.error;
      if (typeof error === 'string') {
        cuerpo.error = error;
      } else if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        cuerpo.error = { message: error.message };
      }
    }
    return cuerpo;
  }

  private obtenerDetalle(cuerpo: CuerpoErrorSpotify): string | undefined {
    if (cuerpo.error_description) {
      return cuerpo.error_description;
    }
    if (typeof cuerpo.error === 'string') {
      return cuerpo.error;
    }
    return cuerpo.error?.message;
  }

  /**
   * Verificar si el error está relacionado con la red
   */
  private esErrorRed(error: Error): boolean {
    const codigosErrorRed = [
      'ECONNRESET',
      'ETIMEDOUT',
      'ENOTFOUND',
      'ECONNREFUSED',
      'EHOSTUNREACH',
      'ENETUNREACH',
      'EAI_AGAIN'
    ];
    const codigo = 'code' in error ? error.code : undefined;

    return codigosErrorRed.some(c =>
      error.message.includes(c) || codigo === c
    );
  }

  private dormir(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Obtener mensaje de error amigable para mostrar al usuario
   */
  obtenerMensajeAmigable(error: ErrorTopTracks): string {
    switch (error.codigo) {
      case 'ERROR_AUTH':
        return 'La autenticación de Spotify falló. Verificá SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET y la Redirect URI configurada en el Dashboard de Spotify.';

      case 'LIMITE_VELOCIDAD':
        return 'Spotify está limitando las solicitudes. Esperá unos minutos e intentá de nuevo.';

      case 'ERROR_RED':
        return 'Error de conexión de red. Por favor verificá tu conexión a internet e intentá de nuevo.';

      case 'SERVICIO_NO_DISPONIBLE':
        return 'El servicio de Spotify no está disponible temporalmente. Por favor intentá más tarde.';

      case 'ARTISTA_NO_ENCONTRADO':
        return `${error.message}. Revisá cómo está escrito el nombre.`;

      default:
        return error.message;
    }
  }
}
