/**
 * Shared Types Index
 */

export * from './config';
export * from './audio';
export * from './voice';
export * from './job';
export * from './workers';
