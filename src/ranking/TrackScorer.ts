import type { Track } from '../models/Track.js';
import type { AggressivenessLevel } from '../models/BuildResult.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Spotify informa la fecha de lanzamiento con precisión de año, mes o día.
 * Si no se puede interpretar se toma `now` (edad cero).
 */
export function parseReleaseDate(dateStr: string, now: Date = new Date()): Date {
  const match = /^(\d{4})(?:-(\d{2}))?(?:-(\d{2}))?$/.exec(dateStr.trim());
  if (!match) {
    return now;
  }

  const year = Number(match[1]);
  const month = match[2] ? Number(match[2]) : 1;
  const day = match[3] ? Number(match[3]) : 1;
  const date = new Date(Date.UTC(year, month - 1, day));

  // Date.UTC acepta 2021-13-40 y lo corre de mes; eso no es una fecha válida
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return now;
  }
  return date;
}

/**
 * Popularidad ponderada por la antigüedad del lanzamiento.
 *
 * - 0: popularidad pura de Spotify (favorece lo nuevo)
 * - 1: sutil, `ln(ln(edad) + 1)`
 * - 2: balanceado, `ln(edad)`
 * - 3: agresivo, `sqrt(edad)`
 *
 * `edad` son los días desde el lanzamiento más 2, para que los logaritmos no den cero o negativo.
 */
export function calculateCustomScore(track: Track, aggressiveness: AggressivenessLevel, now: Date = new Date()): number {
  const popularity = track.popularity ?? 0;

  if (aggressiveness === 0) {
    return popularity;
  }

  const releaseDateStr = track.album.releaseDate;
  if (!releaseDateStr) {
    return popularity;
  }

  const releaseDate = parseReleaseDate(releaseDateStr, now);
  const daysSinceRelease = Math.max(0, Math.floor((now.getTime() - releaseDate.getTime()) / DAY_MS));
  const ageFactor = daysSinceRelease + 2;

  switch (aggressiveness) {
    case 1:
      return popularity * Math.log(Math.log(ageFactor) + 1);
    case 2:
      return popularity * Math.log(ageFactor);
    case 3:
      return popularity * Math.sqrt(ageFactor);
  }
}

/**
 * Ranking de la discografía completa: sin IDs repetidos, ordenado por puntaje
 * y sin nombres repetidos (versiones del mismo tema en single y álbum).
 */
export function rankCatalogTracks(
  tracks: Track[],
  topN: number,
  aggressiveness: AggressivenessLevel,
  now: Date = new Date()
): Track[] {
  const uniqueById = new Map<string, Track>();
  for (const track of tracks) {
    if (!uniqueById.has(track.id)) {
      uniqueById.set(track.id, track);
    }
  }

  const scored = [...uniqueById.values()]
    .map(track => ({ track, score: calculateCustomScore(track, aggressiveness, now) }))
    .sort((a, b) => b.score - a.score);

  const selected: Track[] = [];
  const seenNames = new Set<string>();

  for (const { track } of scored) {
    if (selected.length >= topN) break;
    if (seenNames.has(track.title)) continue;

    selected.push(track);
    seenNames.add(track.title);
  }

  return selected;
}
