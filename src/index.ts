/**
 * glbindgen
 *
 * Generates TypeScript bindings for GL, GLES, GLX, WGL and EGL from the
 * Khronos API registry.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './errors.js';
export * from './registry/index.js';
export * from './type-map/index.js';
export * from './resolver/index.js';
export * from './generators/index.js';
export * from './bindings/index.js';
export * from './runtime/index.js';
export * from './config/index.js';
export { Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';
