/**
 * Shared types and utilities for taskmesh agents and services
 */

export * from './types.js';
export * from './errors.js';
export * from './logger.js';
export * from './config.js';
export * from './retry.js';
export * from './coordinatorClient.js';
export * from './recoveryJournal.js';
export * from './agentRunner.js';
