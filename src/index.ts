/**
 * @module
 * The main entry point for effectloom. Computations declare the effects they
 * need as tagged requests, suspend at each one, and are resumed once a
 * handler layer (or the caller) supplies the result.
 */

// Single-slot mailbox shared by a computation and its handler layers
export * from './mailbox';

// Restartable computations, handler attachment and the driving loop
export * from './computation';

// Select / CoSelect over tagged request unions
export * from './algebra';

// Effect suites, the handler contract and perform
export * from './handlers';

// Cooperative task scheduler (spawn, output) and its ordered task table
export * from './scheduler';
export * from './task-table';

// Error types and guards
export * from './errors';

// Logger interface for layer and scheduler diagnostics
export * from './logger';
