import chalk from 'chalk';
import gradient from 'gradient-string';
import figlet from 'figlet';
import { TopTracksApp } from '../TopTracksApp.js';
import { DEFAULT_CONFIG, HELP_MESSAGES } from '../config/defaults.js';
import { ConfigPaths } from '../utils/ConfigPaths.js';
import { ErrorConfiguracion, ManejadorErrores } from '../utils/ErrorHandler.js';
import type { AggressivenessLevel, TrackSource } from '../models/BuildResult.js';

export interface RunOptions {
    help: false;
    artistName: string;
    topN: number;
    source: TrackSource;
    aggressiveness: AggressivenessLevel;
    isPublic: boolean;
    tokenCachePath?: string;
    envPath?: string;
}

export type CLIOptions = { help: true } | RunOptions;

const SOURCES: readonly TrackSource[] = ['top-tracks', 'catalog'];

function isTrackSource(value: string): value is TrackSource {
    return SOURCES.some(source => source === value);
}

function parseAggressiveness(value: string | undefined): AggressivenessLevel {
    switch (value) {
        case '0': return 0;
        case '1': return 1;
        case '2': return 2;
        case '3': return 3;
        default:
            throw new ErrorConfiguracion(`Nivel de agresividad inválido: ${value ?? '(vacío)'}. Usá 0, 1, 2 o 3`);
    }
}

function requireValue(args: string[], i: number, flag: string): string {
    const value = args[i + 1];
    if (value === undefined) {
        throw new ErrorConfiguracion(`Falta el valor de ${flag}`);
    }
    return value;
}

export class TopTracksCLI {
    constructor(private options: CLIOptions) { }

    /**
     * Parsea argumentos, corre la aplicación y devuelve el código de salida
     */
    static async run(args: string[]): Promise<number> {
        let options: CLIOptions;
        try {
            options = TopTracksCLI.parseArguments(args);
        } catch (error) {
            TopTracksCLI.reportError(error);
            console.error(chalk.gray('Usá --help para ver las opciones.'));
            return 1;
        }

        return new TopTracksCLI(options).main();
    }

    async main(): Promise<number> {
        const options = this.options;
        if (options.help) {
            TopTracksCLI.showHelp();
            return 0;
        }

        try {
            this.showWelcome();

            const app = new TopTracksApp({
                artistName: options.artistName,
                topN: options.topN,
                source: options.source,
                aggressiveness: options.aggressiveness,
                isPublic: options.isPublic,
                ...(options.envPath ? { envPath: options.envPath } : {}),
                ...(options.tokenCachePath ? { tokenCachePath: options.tokenCachePath } : {})
            });
            await app.run();
            return 0;

        } catch (error) {
            TopTracksCLI.reportError(error);
            return 1;
        }
    }

    showWelcome(): void {
        const title = figlet.textSync('Top N', {
            font: 'Big',
            horizontalLayout: 'default',
            verticalLayout: 'default'
        });

        console.log(gradient.pastel.multiline(title));
        console.log(gradient.pastel(`${HELP_MESSAGES.WELCOME} · ${HELP_MESSAGES.DESCRIPTION}`));
        console.log(chalk.gray('─'.repeat(60)));
    }

    /**
     * Parse command line arguments
     */
    static parseArguments(args: string[]): CLIOptions {
        const positionals: string[] = [];
        let source: TrackSource | undefined;
        let aggressiveness: AggressivenessLevel | undefined;
        let isPublic = true;
        let tokenCachePath: string | undefined;
        let envPath: string | undefined;
        let endOfOptions = false;

        for (let i = 0; i < args.length; i++) {
            const arg = args[i];

            if (endOfOptions) {
                positionals.push(arg);
                continue;
            }

            switch (arg) {
                case '--':
                    endOfOptions = true;
                    break;

                case '--help':
                case '-h':
                    return { help: true };

                case '--source':
                case '-s': {
                    const value = requireValue(args, i, arg);
                    if (!isTrackSource(value)) {
                        throw new ErrorConfiguracion(`Origen inválido: ${value}. Usá "top-tracks" o "catalog"`);
                    }
                    source = value;
                    i++; // Skip next argument
                    break;
                }

                case '--aggressiveness':
                case '-a':
                    aggressiveness = parseAggressiveness(args[i + 1]);
                    i++;
                    break;

                case '--private':
                case '-p':
                    isPublic = false;
                    break;

                case '--cache':
                case '-c':
                    tokenCachePath = requireValue(args, i, arg);
                    i++;
                    break;

                case '--env':
                case '-e':
                    envPath = requireValue(args, i, arg);
                    i++;
                    break;

                default:
                    if (arg.startsWith('-') && arg.length > 1) {
                        throw new ErrorConfiguracion(`Opción desconocida: ${arg}. Si es el nombre del artista, poné -- antes`);
                    }
                    positionals.push(arg);
            }
        }

        const [artistArg, topNArg, ...extra] = positionals;

        if (extra.length > 0) {
            throw new ErrorConfiguracion(`Argumentos de más: ${extra.join(' ')}. Si el artista tiene varias palabras, usá comillas`);
        }

        const artistName = artistArg?.trim();
        if (!artistName) {
            throw new ErrorConfiguracion('Falta el nombre del artista');
        }

        if (topNArg === undefined) {
            throw new ErrorConfiguracion('Falta la cantidad de canciones (N)');
        }

        const topN = /^\d+$/.test(topNArg) ? parseInt(topNArg, 10) : NaN;
        if (isNaN(topN) || topN < 1) {
            throw new ErrorConfiguracion(`La cantidad de canciones tiene que ser un entero mayor a 0: ${topNArg}`);
        }

        if (aggressiveness !== undefined && source === 'top-tracks') {
            throw new ErrorConfiguracion('--aggressiveness solo aplica con --source catalog');
        }

        return {
            help: false,
            artistName,
            topN,
            // Pedir agresividad implica rankear la discografía completa
            source: source ?? (aggressiveness !== undefined ? 'catalog' : DEFAULT_CONFIG.DEFAULT_SOURCE),
            aggressiveness: aggressiveness ?? DEFAULT_CONFIG.DEFAULT_AGGRESSIVENESS,
            isPublic,
            tokenCachePath,
            envPath
        };
    }

    /**
     * Display help information
     */
    static showHelp(): void {
        console.log(chalk.bold(`\n${HELP_MESSAGES.WELCOME}\n`));
        console.log('Uso: top-n-spotify "<artista>" <N> [opciones]\n');
        console.log('Opciones:');
        console.log('  -s, --source <origen>         "top-tracks" (por defecto): las más populares según Spotify');
        console.log('                                "catalog": rankea toda la discografía por popularidad y antigüedad');
        console.log('  -a, --aggressiveness <nivel>  Peso de la antigüedad con --source catalog (por defecto: 1)');
        console.log('                                  0: ninguno (popularidad pura, favorece lo nuevo)');
        console.log('                                  1: sutil (logaritmo doble)');
        console.log('                                  2: balanceado (logaritmo, empuja los clásicos)');
        console.log('                                  3: agresivo (raíz cuadrada, favorece los clásicos)');
        console.log('  -p, --private                 Crear la playlist como privada');
        console.log(`  -c, --cache <ruta>            Archivo de cache del token (por defecto: ${ConfigPaths.getTokenCachePath()})`);
        console.log(`  -e, --env <ruta>              Archivo con las credenciales (por defecto: ${DEFAULT_CONFIG.ENV_FILE})`);
        console.log('  -h, --help                    Mostrar este mensaje de ayuda');
        console.log('  --                            Lo que sigue son argumentos, aunque empiece con "-"\n');
        console.log('Ejemplos:');
        console.log('  top-n-spotify "Soda Stereo" 10');
        console.log('  top-n-spotify "Los Redondos" 20 --source catalog -a 2');
        console.log('  top-n-spotify Charly 5 --private');
        console.log('  top-n-spotify -- -M- 5\n');
    }

    private static reportError(error: unknown): void {
        const manejador = new ManejadorErrores();
        const clasificado = manejador.clasificarError(error);
        const amigable = manejador.obtenerMensajeAmigable(clasificado);

        console.error(chalk.red(`\n❌ ${clasificado.message}`));
        if (amigable !== clasificado.message) {
            console.error(chalk.yellow(`💡 ${amigable}`));
        }
    }
}
