/**
 * Builder barrel exports
 */

export * from './types';
export { FileDiscoveryService, SKIPPED_DIRECTORIES } from './file-discovery-service';
