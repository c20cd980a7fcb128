/**
 * Models Module Index
 */

export * from './enums';
export * from './payload';
export * from './envelope';
