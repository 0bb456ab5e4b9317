export * from './config.js';
export * from './fonts.js';
export * from './images.js';
export * from './output.js';
export * from './tokens.js';
