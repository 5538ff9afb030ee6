import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TopTracksCLI } from '../src/cli/TopTracksCLI.js';

describe('TopTracksCLI.parseArguments', () => {
  it('reads the artist and N with top tracks as the default source', () => {
    expect(TopTracksCLI.parseArguments(['Soda Stereo', '10'])).toEqual({
      help: false,
      artistName: 'Soda Stereo',
      topN: 10,
      source: 'top-tracks',
      aggressiveness: 1,
      isPublic: true,
      tokenCachePath: undefined,
      envPath: undefined
    });
  });

  it('accepts options before and after the positionals', () => {
    expect(TopTracksCLI.parseArguments(['-p', 'Charly', '--source', 'catalog', '5', '-a', '3', '-c', '/tmp/cache.json', '--env', '/tmp/.env'])).toEqual({
      help: false,
      artistName: 'Charly',
      topN: 5,
      source: 'catalog',
      aggressiveness: 3,
      isPublic: false,
      tokenCachePath: '/tmp/cache.json',
      envPath: '/tmp/.env'
    });
  });

  it('switches to the catalog source when only the aggressiveness is given', () => {
    const options = TopTracksCLI.parseArguments(['Charly', '5', '--aggressiveness', '0']);

    expect(options).toMatchObject({ source: 'catalog', aggressiveness: 0 });
  });

  it('takes everything after -- as positionals', () => {
    expect(TopTracksCLI.parseArguments(['-p', '--', '-M-', '5'])).toMatchObject({
      help: false,
      artistName: '-M-',
      topN: 5,
      isPublic: false
    });
    expect(TopTracksCLI.parseArguments(['--', '--help', '3'])).toMatchObject({ artistName: '--help', topN: 3 });
  });

  it('returns help as soon as it is asked for', () => {
    expect(TopTracksCLI.parseArguments(['Charly', '--help', '--nope'])).toEqual({ help: true });
  });

  it.each<[string[], string]>([
    [[], 'Falta el nombre del artista'],
    [['Charly'], 'Falta la cantidad de canciones (N)'],
    [['Charly', '0'], 'La cantidad de canciones tiene que ser un entero mayor a 0: 0'],
    [['Charly', '2.5'], 'La cantidad de canciones tiene que ser un entero mayor a 0: 2.5'],
    [['Charly', 'diez'], 'La cantidad de canciones tiene que ser un entero mayor a 0: diez'],
    [['Charly', 'García', '5'], 'Argumentos de más: 5. Si el artista tiene varias palabras, usá comillas'],
    [['Charly', '5', 'extra'], 'Argumentos de más: extra. Si el artista tiene varias palabras, usá comillas'],
    [['Charly', '5', '--verbose'], 'Opción desconocida: --verbose. Si es el nombre del artista, poné -- antes'],
    [['-M-', '5'], 'Opción desconocida: -M-. Si es el nombre del artista, poné -- antes'],
    [['Charly', '5', '--source', 'radio'], 'Origen inválido: radio. Usá "top-tracks" o "catalog"'],
    [['Charly', '5', '--source'], 'Falta el valor de --source'],
    [['Charly', '5', '-a', '7'], 'Nivel de agresividad inválido: 7. Usá 0, 1, 2 o 3'],
    [['Charly', '5', '-a'], 'Nivel de agresividad inválido: (vacío). Usá 0, 1, 2 o 3'],
    [['Charly', '5', '-s', 'top-tracks', '-a', '2'], '--aggressiveness solo aplica con --source catalog']
  ])('rejects %j', (args, message) => {
    expect(() => TopTracksCLI.parseArguments(args)).toThrow(message);
  });
});

describe('TopTracksCLI.run', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the help and exits with 0', async () => {
    expect(await TopTracksCLI.run(['--help'])).toBe(0);
    expect(console.log).toHaveBeenCalledWith('Uso: top-n-spotify "<artista>" <N> [opciones]\n');
  });

  it('exits with 1 on invalid arguments', async () => {
    expect(await TopTracksCLI.run(['Charly'])).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Falta la cantidad de canciones (N)'));
  });
});
