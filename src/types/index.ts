/**
 * Type exports for the code input domain layer
 */

// Error types
export * from './errors';

// Host collaborator contracts
export * from './transport';
