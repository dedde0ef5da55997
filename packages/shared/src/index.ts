export * from './wifi.js';
export * from './recovery.js';
export * from './satellite.js';
export * from './location.js';
export * from './dish.js';
export * from './messages.js';
