// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/track-sample.js';
export * from './entities/track-session.js';
export * from './entities/compression.js';

// ─── Geo ──────────────────────────────────────────────────────────────────────
export * from './geo/distance.js';

// ─── Compression ──────────────────────────────────────────────────────────────
export * from './compression/key-point-detector.js';
export * from './compression/douglas-peucker.js';
export * from './compression/track-compressor.js';
export * from './compression/track-validator.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/track-compression.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/track-sample-repository.port.js';
export * from './ports/outbound/clock.port.js';
