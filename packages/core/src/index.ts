/**
 * @fileoverview @titlecast/core
 *
 * Title-endpoint inference: session bootstrap, ephemeral conversation
 * lifecycle, content packaging, and the transport underneath them.
 */

export * from './errors/index.js';
export * from './logging/index.js';
export * from './settings/index.js';
export * from './transport/index.js';
export * from './api/index.js';
export * from './session/index.js';
export * from './conversation/index.js';
export * from './packaging/index.js';
