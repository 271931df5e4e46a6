import type { NormalizedSample, SectorLayout } from '../types';

const DEFAULT_SECTOR_COUNT = 3;

// A detected layout ending before this share of the lap is missing its last sector
const FINAL_BOUNDARY_RATIO = 0.95;

type SplitSample = Pick<NormalizedSample, 'lapDistance' | 'sectorSplits'>;

/**
 * Detect sector end distances from a completed lap.
 *
 * Each sector's cumulative split reads 0 until the sector is done. The lap
 * distance where a split first turns positive is that sector's boundary;
 * later readings for the same sector are ignored, including noisy zeros.
 * Splits already positive on the first sample belong to a lap joined part
 * way through and mark no boundary.
 */
export function detectSectorBoundaries(
  samples: readonly SplitSample[],
  trackLength: number
): SectorLayout {
  // Array.prototype.sort is stable, ties keep arrival order
  const ordered = [...samples].sort((a, b) => a.lapDistance - b.lapDistance);

  const boundaries: number[] = [];
  const recorded = new Set<number>();
  // A sector missing from the first sample has not been completed yet
  const previous: number[] = ordered.length > 0 ? [...ordered[0].sectorSplits] : [];

  for (const sample of ordered) {
    sample.sectorSplits.forEach((split, sector) => {
      const before = previous[sector] ?? 0;
      if (!recorded.has(sector) && before <= 0 && split > 0) {
        recorded.add(sector);
        boundaries.push(sample.lapDistance);
      }
      previous[sector] = split;
    });
  }

  if (boundaries.length === 0 && trackLength > 0) {
    return {
      boundaries: [trackLength / 3, (trackLength * 2) / 3, trackLength],
      count: DEFAULT_SECTOR_COUNT,
    };
  }

  if (trackLength > 0 && boundaries.length > 0) {
    const last = boundaries[boundaries.length - 1];
    if (last < trackLength * FINAL_BOUNDARY_RATIO) {
      boundaries.push(trackLength);
    }
  }

  return {
    boundaries,
    count: boundaries.length > 0 ? boundaries.length : DEFAULT_SECTOR_COUNT,
  };
}
