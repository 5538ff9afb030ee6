import { createSpinner } from 'nanospinner';
import chalk from 'chalk';
import type { BuildResult } from '../models/BuildResult.js';

type Spinner = ReturnType<typeof createSpinner>;

/**
 * Lo mínimo que necesita PlaylistBuilder para informar cada paso
 */
export interface StepReporter {
  startStep(text: string): void;
  updateStep(text: string): void;
  succeedStep(text: string): void;
  failStep(text: string): void;
}

export class ProgressReporter implements StepReporter {
  private spinner: Spinner | null = null;

  /**
   * Iniciar el spinner para un paso contra la API
   */
  startStep(text: string): void {
    this.stop();
    this.spinner = createSpinner(text).start();
  }

  updateStep(text: string): void {
    this.spinner?.update({ text });
  }

  succeedStep(text: string): void {
    if (!this.spinner) {
      console.log(chalk.green(`✔ ${text}`));
      return;
    }
    this.spinner.success({ text });
    this.spinner = null;
  }

  failStep(text: string): void {
    if (!this.spinner) {
      console.log(chalk.red(`✖ ${text}`));
      return;
    }
    this.spinner.error({ text });
    this.spinner = null;
  }

  /**
   * Mostrar resumen final de la playlist creada
   */
  displaySummary(result: BuildResult): void {
    const processingTimeSeconds = Math.round(result.processingTime / 1000);

    console.log('\n' + chalk.bold('🤠🤙 ¡Listo! 😎🤟'));
    console.log('═'.repeat(50));
    console.log(`   Playlist: ${chalk.magenta(result.playlist.name)}`);
    console.log(`   Artista: ${chalk.cyan(result.artist.name)}`);
    console.log(`   Canciones: ${chalk.green(result.tracks.length)}${result.tracks.length < result.requested ? chalk.yellow(` (pediste ${result.requested})`) : ''}`);
    console.log(`   Origen: ${chalk.gray(result.source === 'catalog' ? 'discografía completa' : 'top tracks de Spotify')}`);
    console.log(`   Tiempo de procesamiento: ${chalk.yellow(processingTimeSeconds + 's')}`);

    console.log(chalk.bold('\n🎵 Canciones:'));
    result.tracks.forEach((track, index) => {
      console.log(`   ${String(index + 1).padStart(2)}. ${track.title} ${chalk.gray(`(${track.album.name})`)}`);
    });

    console.log(`\n🔗 Escuchala acá: ${chalk.cyan(result.playlist.url)}`);
    console.log('═'.repeat(50));
  }

  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
