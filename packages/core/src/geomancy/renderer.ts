import {
  FIGURE_COLUMNS,
  FIGURE_COLUMN_WIDTH,
  FIGURE_ELEMENTS,
  FIGURE_LABEL_WIDTH,
  FIGURE_ROWS,
} from '@geomancer/shared';
import type { ChosenFour, ClassifiedSatellite, Direction, Figure, FigureRow, Glyph, RenderResult } from '@geomancer/shared';
import { missingDirections } from '../satellite/selector.js';

/** Even values (0 included) read as two marks, odd ones as a single mark */
export function glyph(value: number): Glyph {
  return value % 2 === 0 ? '**' : '* ';
}

const ROW_VALUE: Record<FigureRow, (sat: ClassifiedSatellite) => number> = {
  prn: (sat) => sat.prn,
  ele: (sat) => sat.elevation,
  azi: (sat) => sat.azimuth,
  snr: (sat) => sat.snr,
};

function centre(text: string): string {
  const room = Math.max(FIGURE_COLUMN_WIDTH - text.length, 0);
  const left = Math.floor(room / 2);
  return ' '.repeat(left) + text + ' '.repeat(room - left);
}

function line(label: string, cells: string[]): string {
  return label.padEnd(FIGURE_LABEL_WIDTH) + cells.map(centre).join('');
}

export function buildFigure(chosen: Record<Direction, ClassifiedSatellite>): Figure {
  const rowGlyphs = (row: FigureRow): Record<Direction, Glyph> => {
    const value = ROW_VALUE[row];
    return {
      West: glyph(value(chosen.West)),
      North: glyph(value(chosen.North)),
      East: glyph(value(chosen.East)),
      South: glyph(value(chosen.South)),
    };
  };
  return { prn: rowGlyphs('prn'), ele: rowGlyphs('ele'), azi: rowGlyphs('azi'), snr: rowGlyphs('snr') };
}

/**
 * Text figure: element and ordinal header lines, one glyph row per
 * attribute, direction names underneath. Columns are West, North, East,
 * South, nine characters each after a four-character row label, so every
 * line has the same width. A figure with a missing direction is refused
 * rather than padded.
 */
export function renderDiagram(chosen: ChosenFour): RenderResult {
  const missing = missingDirections(chosen);
  const { West, North, East, South } = chosen;
  if (missing.length > 0 || !West || !North || !East || !South) return { ok: false, missing };

  const figure = buildFigure({ West, North, East, South });
  const lines = [
    line('', FIGURE_COLUMNS.map((d) => FIGURE_ELEMENTS[d].element)),
    line('', FIGURE_COLUMNS.map((d) => FIGURE_ELEMENTS[d].ordinal)),
    ...FIGURE_ROWS.map((row) => line(row, FIGURE_COLUMNS.map((d) => figure[row][d]))),
    line('', [...FIGURE_COLUMNS]),
  ];
  return { ok: true, text: lines.join('\n'), figure };
}
