export { nmeaChecksum, decodeSentence, sentenceHeader } from './nmea/decoder.js';
export { assembleReport, parseCount } from './nmea/assembler.js';
export type { AssembleOptions } from './nmea/assembler.js';
export { buildSatelliteTable, flattenReport } from './satellite/table.js';
export { classifyAzimuth, classifySatellites } from './satellite/classifier.js';
export type { Bearing } from './satellite/classifier.js';
export { selectCandidates, missingDirections } from './satellite/selector.js';
export { glyph, buildFigure, renderDiagram } from './geomancy/renderer.js';
export { GeomancyReader } from './geomancy/reader.js';
export type { CycleResult, FixWaitResult } from './geomancy/reader.js';
