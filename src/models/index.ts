/**
 * Models barrel export
 */

export * from './document.model';
export * from './question.model';
export * from './extractor-config.model';
