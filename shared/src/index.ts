/**
 * Shared types and constants for renshuu-connect
 *
 * AnkiConnect protocol definitions used by the server and by any client
 * that wants typed requests.
 *
 * @packageDocumentation
 */

export * from './types';
export * from './constants';
