/**
 * Signed dispatch module
 */

export * from './signed-request.js';
export * from './fetch-dispatcher.js';
