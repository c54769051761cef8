/**
 * sockwell
 *
 * Cross-platform TCP, UDP and local sockets with typed errors.
 */

export * from './lib';
