export * from './nmea.js';
export * from './satellite.js';
export * from './geomancy.js';
export * from './transport.js';
