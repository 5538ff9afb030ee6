import chalk from 'chalk';
import { AuthManager } from './auth/AuthManager.js';
import { TokenCache } from './auth/TokenCache.js';
import { SpotifyService } from './services/SpotifyService.js';
import { PlaylistBuilder } from './services/PlaylistBuilder.js';
import type { MusicCatalog } from './services/MusicCatalog.js';
import { ConfigManager, type Environment } from './config/ConfigManager.js';
import { DEFAULT_CONFIG, HELP_MESSAGES } from './config/defaults.js';
import type { Credentials } from './models/Auth.js';
import type { AggressivenessLevel, BuildResult, TrackSource } from './models/BuildResult.js';
import { ProgressReporter, type StepReporter } from './utils/ProgressReporter.js';
import { ConfigPaths } from './utils/ConfigPaths.js';
import { ErrorConfiguracion } from './utils/ErrorHandler.js';

export interface AppConfig {
  artistName: string;
  topN: number;
  source: TrackSource;
  aggressiveness: AggressivenessLevel;
  isPublic: boolean;
  envPath: string;
  tokenCachePath: string;
}

export type AppReporter = StepReporter & Pick<ProgressReporter, 'displaySummary' | 'stop'>;

export interface AppDependencies {
  configManager?: ConfigManager;
  authManager?: Pick<AuthManager, 'getAccessToken'>;
  createCatalog?: (accessToken: string) => MusicCatalog;
  reporter?: AppReporter;
  env?: Environment;
}

export class TopTracksApp {
  private config: AppConfig;
  private configManager: ConfigManager;
  private authManager: Pick<AuthManager, 'getAccessToken'>;
  private createCatalog: (accessToken: string) => MusicCatalog;
  private reporter: AppReporter;
  private env: Environment;

  constructor(config: Pick<AppConfig, 'artistName' | 'topN'> & Partial<AppConfig>, deps: AppDependencies = {}) {
    this.config = {
      source: DEFAULT_CONFIG.DEFAULT_SOURCE,
      aggressiveness: DEFAULT_CONFIG.DEFAULT_AGGRESSIVENESS,
      isPublic: true,
      envPath: DEFAULT_CONFIG.ENV_FILE,
      tokenCachePath: ConfigPaths.getTokenCachePath(),
      ...config
    };

    this.configManager = deps.configManager ?? new ConfigManager();
    this.authManager = deps.authManager ?? new AuthManager({ tokenCache: new TokenCache(this.config.tokenCachePath) });
    this.createCatalog = deps.createCatalog ?? ((accessToken) => new SpotifyService(accessToken));
    this.reporter = deps.reporter ?? new ProgressReporter();
    this.env = deps.env ?? process.env;
  }

  /**
   * Credenciales → token → playlist → resumen
   */
  async run(): Promise<BuildResult> {
    try {
      const credentials = await this.validateAndLoadCredentials();

      console.log('🔐 Autenticando con Spotify...');
      const accessToken = await this.authManager.getAccessToken(credentials);

      const builder = new PlaylistBuilder(this.createCatalog(accessToken), this.reporter);
      const result = await builder.build({
        artistName: this.config.artistName,
        topN: this.config.topN,
        source: this.config.source,
        aggressiveness: this.config.aggressiveness,
        isPublic: this.config.isPublic
      });

      this.reporter.displaySummary(result);
      return result;

    } finally {
      this.reporter.stop();
    }
  }

  /**
   * Validar credenciales y guiar al usuario si faltan
   */
  private async validateAndLoadCredentials(): Promise<Credentials> {
    this.configManager.loadEnvFile(this.config.envPath);

    const validation = this.configManager.validateEnvironment(this.env);
    if (validation.isValid) {
      return this.configManager.loadCredentials(this.env);
    }

    console.log(chalk.yellow('\n⚠️  Credenciales incompletas o inválidas'));
    validation.missingFields.forEach(field => console.log(chalk.red(`   • Falta: ${field}`)));

    if (!(await this.configManager.checkEnvFileExistsAsync(this.config.envPath))) {
      const createdPath = await this.configManager.createEnvTemplate(this.config.envPath);
      console.log(chalk.green('\n✅ Archivo de credenciales creado: ') + chalk.cyan(createdPath));
    }
    console.log(chalk.white(HELP_MESSAGES.CREDENTIALS_MISSING));

    throw new ErrorConfiguracion(validation.errors.join('; '));
  }
}
