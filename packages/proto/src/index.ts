// Shared data model, contracts, error taxonomy and document loader
export * from './schemas';
export * from './contracts';
export * from './errors';
export * from './document';
