export * from './telemetry.js';
export * from './weather.js';
export * from './cyber.js';
export * from './alerts.js';
export * from './diagnostics.js';
export * from './policy.js';
export * from './impact.js';
export * from './resilience.js';
