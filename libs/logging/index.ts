/**
 * Public API exports for the logging library.
 * This allows clean imports: import { LoggingModule, ContextStore } from '@logging'
 */

// Module
export { LoggingModule } from './logging.module';

// Domain
export * from './core/domain';
export { QueryLogPort } from './core/ports/out';
export * from './core/value-objects';

// Services
export * from './service';

// Infrastructure
export * from './infrastructure';

// Presentation
export * from './presentation';
