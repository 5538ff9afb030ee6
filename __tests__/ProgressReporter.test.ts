import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { ProgressReporter } from '../src/utils/ProgressReporter.js';
import { makeTrack } from './utils/mocks.js';

describe('ProgressReporter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints step results directly when no spinner is running', () => {
    const reporter = new ProgressReporter();

    reporter.succeedStep('Playlist creada');
    reporter.failStep('Sin canciones');

    expect(console.log).toHaveBeenNthCalledWith(1, chalk.green('✔ Playlist creada'));
    expect(console.log).toHaveBeenNthCalledWith(2, chalk.red('✖ Sin canciones'));
  });

  it('lists the tracks and warns when fewer than requested were added', () => {
    const reporter = new ProgressReporter();

    reporter.displaySummary({
      artist: { id: 'artist-1', name: 'Soda Stereo' },
      tracks: [makeTrack('t1', { title: 'De música ligera', album: { id: 'a1', name: 'Canción animal' } })],
      playlist: { id: 'pl-1', name: 'Top 3 Soda Stereo', url: 'https://open.spotify.com/playlist/pl-1' },
      source: 'top-tracks',
      requested: 3,
      processingTime: 1500
    });

    expect(console.log).toHaveBeenCalledWith(`   Canciones: ${chalk.green(1)}${chalk.yellow(' (pediste 3)')}`);
    expect(console.log).toHaveBeenCalledWith(`    1. De música ligera ${chalk.gray('(Canción animal)')}`);
    expect(console.log).toHaveBeenCalledWith(`   Tiempo de procesamiento: ${chalk.yellow('2s')}`);
    expect(console.log).toHaveBeenCalledWith(`\n🔗 Escuchala acá: ${chalk.cyan('https://open.spotify.com/playlist/pl-1')}`);
  });
});
