// ============================================================================
// Geomancer Figure Types
// ============================================================================
import type { Direction } from './satellite.js';

export type Glyph = '**' | '* ';

export type FigureRow = 'prn' | 'ele' | 'azi' | 'snr';

/** Column order of the rendered figure */
export const FIGURE_COLUMNS: readonly Direction[] = ['West', 'North', 'East', 'South'];

export const FIGURE_ROWS: readonly FigureRow[] = ['prn', 'ele', 'azi', 'snr'];

/** Element and ordinal of each column, after Skinner's terrestrial astronomy tables */
export const FIGURE_ELEMENTS: Record<Direction, { element: string; ordinal: string }> = {
  West: { element: 'Earth', ordinal: 'IV' },
  North: { element: 'Water', ordinal: 'III' },
  East: { element: 'Air', ordinal: 'II' },
  South: { element: 'Fire', ordinal: 'I' },
};

export const FIGURE_COLUMN_WIDTH = 9;
export const FIGURE_LABEL_WIDTH = 4;

export type Figure = Record<FigureRow, Record<Direction, Glyph>>;

export type RenderResult =
  | { ok: true; text: string; figure: Figure }
  | { ok: false; missing: Direction[] };
